/**
 * Sampling and generation throughput over a large register file:
 *   1. Coverage sampling with both standard crosses
 *   2. Stimulus generation with soft weighting
 *   3. Frame encode + decode
 */

import { bench, describe } from "vitest";
import { CoverageEngine } from "./coverage-engine.js";
import { packRequest, unpackRequest } from "./frame.js";
import { createRandom } from "./random.js";
import type { RegisterDefinition } from "./register-map.js";
import { RegisterModel } from "./register-model.js";
import { defineSpiCoverage } from "./spi-coverage.js";
import { StimulusGenerator } from "./stimulus.js";
import type { Transaction } from "./transaction.js";

const REGISTERS: RegisterDefinition[] = Array.from({ length: 200 }, (_, i): RegisterDefinition => ({
  name: `R${i}`,
  address: i,
  bitWidth: 1 + (i % 16),
  access: i % 7 === 0 ? "ro" : "rw",
}));

describe("coverage", () => {
  const model = new RegisterModel(REGISTERS);
  const engine = new CoverageEngine();
  defineSpiCoverage(engine, model);
  const generator = new StimulusGenerator({ random: createRandom(1) });
  const stream: Transaction[] = Array.from({ length: 1000 }, () => generator.next(model));

  bench("sample_1000_transactions", () => {
    for (const trx of stream) engine.sample(trx);
  });
});

describe("stimulus", () => {
  const model = new RegisterModel(REGISTERS);
  const generator = new StimulusGenerator({ random: createRandom(2) });
  const covered = new Set(REGISTERS.slice(0, 100).map((r) => r.name));

  bench("generate_1000_transactions", () => {
    for (let i = 0; i < 1000; i++) generator.next(model, covered);
  });
});

describe("frame", () => {
  bench("pack_unpack_request", () => {
    for (let address = 0; address < 256; address++) {
      unpackRequest(packRequest({ chipAddress: 3, direction: "write", broadcast: false, address, data: address * 7 }));
    }
  });
});

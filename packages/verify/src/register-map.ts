/**
 * Register map input: JSON files keyed by register name, validated with Ajv
 * and expanded into one definition per addressable register.
 */

import { readFile } from "node:fs/promises";
import AjvModule from "ajv";
import type { ErrorObject } from "ajv";
import { RegisterMapError } from "./errors.js";

const Ajv = AjvModule.default;

export type AccessMode = "ro" | "rw";

export interface RegisterMapEntry {
  /** Address of the register, or of the first element of an array. */
  address: number;
  bitWidth: number;
  access: AccessMode;
  resetValue?: number;
  /** Expand into `count` registers at consecutive addresses. */
  count?: number;
  /**
   * Split an array into groups of `groupWidths.length` registers; member `j`
   * of every group is `groupWidths[j]` bits wide.
   */
  groupWidths?: number[];
}

export type RegisterMap = Record<string, RegisterMapEntry>;

/** One addressable register after array expansion. */
export interface RegisterDefinition {
  readonly name: string;
  readonly address: number;
  readonly bitWidth: number;
  readonly access: AccessMode;
  readonly resetValue?: number;
}

export const REGISTER_MAP_SCHEMA = {
  $id: "regbus:register-map",
  type: "object",
  minProperties: 1,
  propertyNames: { pattern: "^[A-Za-z_][A-Za-z0-9_]*$" },
  additionalProperties: {
    type: "object",
    required: ["address", "bitWidth", "access"],
    additionalProperties: false,
    properties: {
      address: { type: "integer", minimum: 0, maximum: 255 },
      bitWidth: { type: "integer", minimum: 1, maximum: 16 },
      access: { enum: ["ro", "rw"] },
      resetValue: { type: "integer", minimum: 0, maximum: 65535 },
      count: { type: "integer", minimum: 1, maximum: 256 },
      groupWidths: {
        type: "array",
        minItems: 1,
        items: { type: "integer", minimum: 1, maximum: 16 },
      },
    },
  },
} as const;

const ajv = new Ajv({ allErrors: true });
const validateSchema = ajv.compile<RegisterMap>(REGISTER_MAP_SCHEMA);

function describeErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((e) => `${e.instancePath === "" ? "/" : e.instancePath} ${e.message ?? "is invalid"}`);
}

/** Validate untrusted JSON against the register map schema. */
export function parseRegisterMap(raw: unknown): RegisterMap {
  if (!validateSchema(raw)) {
    throw new RegisterMapError("Invalid register map", describeErrors(validateSchema.errors));
  }
  // Expansion checks address overlap and reset values, so fail early here.
  expandRegisterMap(raw);
  return raw;
}

/** Read and validate a register map JSON file. */
export async function loadRegisterMap(path: string): Promise<RegisterMap> {
  const text = await readFile(path, "utf-8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new RegisterMapError(
      `Register map ${path} is not valid JSON`,
      [err instanceof Error ? err.message : String(err)],
    );
  }
  return parseRegisterMap(raw);
}

/**
 * Expand array declarations into single registers, in map order.
 *
 * `BIAS: { address: 0x10, count: 3 }` becomes `BIAS_0..BIAS_2` at
 * 0x10..0x12. With `groupWidths: [12, 9, 9]` and `count: 6` the names are
 * `RES_0_0, RES_0_1, RES_0_2, RES_1_0, ...` with widths 12, 9, 9, 12, ...
 */
export function expandRegisterMap(map: RegisterMap): RegisterDefinition[] {
  const out: RegisterDefinition[] = [];
  const byAddress = new Map<number, string>();
  const problems: string[] = [];

  const add = (def: RegisterDefinition): void => {
    const clash = byAddress.get(def.address);
    if (clash !== undefined) {
      problems.push(`${def.name} reuses address 0x${def.address.toString(16)} of ${clash}`);
      return;
    }
    if (def.address > 0xff) {
      problems.push(`${def.name} address 0x${def.address.toString(16)} exceeds 8 bits`);
      return;
    }
    if (def.resetValue !== undefined && def.resetValue > 2 ** def.bitWidth - 1) {
      problems.push(`${def.name} reset value ${def.resetValue} exceeds ${def.bitWidth} bits`);
      return;
    }
    byAddress.set(def.address, def.name);
    out.push(def);
  };

  for (const [name, entry] of Object.entries(map)) {
    const count = entry.count ?? 1;
    const groups = entry.groupWidths;
    const base = { access: entry.access, resetValue: entry.resetValue };

    if (groups !== undefined) {
      if (count % groups.length !== 0) {
        problems.push(`${name} count ${count} is not a multiple of its group size ${groups.length}`);
        continue;
      }
      for (let g = 0; g < count / groups.length; g++) {
        groups.forEach((bitWidth, j) => {
          add({
            ...base,
            name: `${name}_${g}_${j}`,
            address: entry.address + g * groups.length + j,
            bitWidth,
          });
        });
      }
    } else if (count > 1) {
      for (let i = 0; i < count; i++) {
        add({ ...base, name: `${name}_${i}`, address: entry.address + i, bitWidth: entry.bitWidth });
      }
    } else {
      add({ ...base, name, address: entry.address, bitWidth: entry.bitWidth });
    }
  }

  if (problems.length > 0) {
    throw new RegisterMapError("Invalid register map", problems);
  }
  return out;
}

/** Value of a chip identification register: chip id in the high nibble, chip address below. */
export function chipIdValue(chipId: number, chipAddress: number): number {
  return ((chipId & 0xf) << 4) | (chipAddress & 0x7);
}

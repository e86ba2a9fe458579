/**
 * Maps `terraform output -json` onto the configured target roles.
 */

import type { TargetDefinition } from "../config/index.js";
import { ProvisionError } from "../errors.js";
import type { ProvisionedTarget } from "../types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function outputFailed(message: string): ProvisionError {
  return new ProvisionError({ kind: "OutputFailed", stage: "output", exitCode: 0, message });
}

/** Unwrap `{ value, type, sensitive }` records into plain values. */
export function parseOutputJson(text: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw outputFailed("Provisioning outputs are not valid JSON");
  }
  if (!isRecord(parsed)) throw outputFailed("Provisioning outputs are not a JSON object");

  const values: Record<string, unknown> = {};
  for (const [name, entry] of Object.entries(parsed)) {
    values[name] = isRecord(entry) && "value" in entry ? entry.value : entry;
  }
  return values;
}

/** An output as a list of addresses; a single string is a list of one. */
function addressList(outputs: Record<string, unknown>, name: string): string[] | null {
  const value = outputs[name];
  if (typeof value === "string") return value.trim() ? [value.trim()] : null;
  if (Array.isArray(value)) {
    const list: string[] = [];
    for (const item of value) {
      if (typeof item !== "string" || !item.trim()) return null;
      list.push(item.trim());
    }
    return list.length > 0 ? list : null;
  }
  return null;
}

/**
 * One target per address. A list output yields `<name>-1`, `<name>-2`, ...
 */
export function targetsFromOutputs(
  outputs: Record<string, unknown>,
  definitions: readonly TargetDefinition[],
): ProvisionedTarget[] {
  const targets: ProvisionedTarget[] = [];

  for (const def of definitions) {
    const addresses = addressList(outputs, def.addressOutput);
    if (!addresses) {
      throw outputFailed(`Output "${def.addressOutput}" for role ${def.role} is missing or empty`);
    }
    const privates = def.privateAddressOutput ? addressList(outputs, def.privateAddressOutput) : null;
    const isList = Array.isArray(outputs[def.addressOutput]);

    addresses.forEach((address, index) => {
      targets.push({
        id: `${def.role}:${address}`,
        role: def.role,
        name: isList ? `${def.name}-${index + 1}` : def.name,
        group: def.group,
        address,
        privateAddress: privates?.[index],
        credentialKeys: [...def.credentials],
        status: "unknown",
      });
    });
  }

  return targets;
}

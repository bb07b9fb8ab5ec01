/**
 * PlanDocument
 *
 * A plan is an arbitrary JSON object constrained by the plan schema.
 * It carries its own identifier in `objectId`, which is also its storage key.
 *
 * The JSON types are kept structural so the merge engine and the validator
 * can walk any document without knowing the plan shape.
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

export type PlanDocument = JsonObject;

export function isJsonObject(value: unknown): value is JsonObject {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every(isJsonValue)
  );
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      return Array.isArray(value) ? value.every(isJsonValue) : isJsonObject(value);
    default:
      return false;
  }
}

/**
 * Read the identifier a plan carries.
 * Returns undefined when `objectId` is missing or not a non-empty string.
 */
export function readPlanId(plan: PlanDocument): string | undefined {
  const objectId = plan.objectId;
  return typeof objectId === 'string' && objectId.trim().length > 0 ? objectId : undefined;
}

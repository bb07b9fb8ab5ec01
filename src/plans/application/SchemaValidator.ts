// src/plans/application/SchemaValidator.ts

/**
 * SchemaValidator
 *
 * Holds the plan JSON Schema compiled twice:
 * - strict: the schema as authored, used for full documents (create/replace).
 * - partial: the same schema with every `required` list removed at every
 *   nesting level, used for patch documents, which may carry any subset of fields.
 *
 * Both report every violation (Ajv `allErrors`), not only the first one.
 * Stateless after construction.
 */

import fs from 'fs';
import path from 'path';
import Ajv, { type ErrorObject, type SchemaObject, type ValidateFunction } from 'ajv';
import mapValues from 'lodash/mapValues';

export type ValidationResult = { valid: true } | { valid: false; issues: string[] };

export interface ISchemaValidator {
  validate(document: unknown): ValidationResult;
  validatePartial(document: unknown): ValidationResult;
}

/**
 * Raised at start-up when the schema file cannot be read, parsed or compiled.
 */
export class SchemaLoadError extends Error {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SchemaLoadError';
  }
}

/** Keywords whose value is a subschema or an array of subschemas. */
const SUBSCHEMA_KEYWORDS = new Set([
  'items',
  'additionalItems',
  'additionalProperties',
  'contains',
  'propertyNames',
  'not',
  'if',
  'then',
  'else',
  'allOf',
  'anyOf',
  'oneOf',
]);

/** Keywords whose value maps names to subschemas. */
const SUBSCHEMA_MAP_KEYWORDS = new Set([
  'properties',
  'patternProperties',
  'definitions',
  '$defs',
  'dependencies',
]);

export class SchemaValidator implements ISchemaValidator {
  private readonly strict: ValidateFunction;
  private readonly partial: ValidateFunction;

  public constructor(schema: SchemaObject) {
    // Separate Ajv instances: both schemas share the same $id.
    this.strict = new Ajv({ allErrors: true }).compile(schema);
    this.partial = new Ajv({ allErrors: true }).compile(stripRequired(schema));
  }

  /**
   * Load and compile the schema at `schemaPath` (relative to the working directory).
   * Any failure is fatal for the process.
   */
  public static fromFile(schemaPath: string): SchemaValidator {
    const resolved = path.resolve(schemaPath);

    let raw: string;
    try {
      raw = fs.readFileSync(resolved, 'utf8');
    } catch (err) {
      throw new SchemaLoadError(`Failed to read JSON schema from path: ${resolved}`, {
        cause: err,
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new SchemaLoadError(`JSON schema at ${resolved} is not valid JSON`, { cause: err });
    }

    if (!isSchemaObject(parsed)) {
      throw new SchemaLoadError(`JSON schema at ${resolved} must be a JSON object`);
    }

    try {
      return new SchemaValidator(parsed);
    } catch (err) {
      throw new SchemaLoadError(`JSON schema at ${resolved} failed to compile`, { cause: err });
    }
  }

  public validate(document: unknown): ValidationResult {
    return run(this.strict, document);
  }

  public validatePartial(document: unknown): ValidationResult {
    return run(this.partial, document);
  }
}

function run(validateFn: ValidateFunction, document: unknown): ValidationResult {
  if (validateFn(document)) {
    return { valid: true };
  }

  const issues = (validateFn.errors ?? []).map(formatIssue);
  return { valid: false, issues: issues.length > 0 ? issues : ['/ is invalid'] };
}

/**
 * Render an Ajv error as "<instance path> <message>", e.g.
 * "/planCostShares/copay must be number" or "/ must have required property 'objectId'".
 */
export function formatIssue(error: ErrorObject): string {
  const location = error.instancePath || '/';
  const message = error.message ?? 'is invalid';

  if (error.keyword === 'additionalProperties') {
    const extra: unknown = error.params.additionalProperty;
    if (typeof extra === 'string') {
      return `${location} ${message}: '${extra}'`;
    }
  }

  return `${location} ${message}`;
}

/**
 * Copy of `schema` without any `required` constraint, at every nesting level
 * reachable through subschema keywords (including `$ref` targets under
 * `definitions`/`$defs`).
 */
export function stripRequired(schema: SchemaObject): SchemaObject {
  const copy: SchemaObject = {};

  for (const [keyword, value] of Object.entries(schema)) {
    if (keyword === 'required') continue;

    if (SUBSCHEMA_KEYWORDS.has(keyword)) {
      copy[keyword] = stripNode(value);
    } else if (SUBSCHEMA_MAP_KEYWORDS.has(keyword) && isSchemaObject(value)) {
      copy[keyword] = mapValues(value, stripNode);
    } else {
      copy[keyword] = value;
    }
  }

  return copy;
}

function stripNode(node: unknown): unknown {
  if (Array.isArray(node)) return node.map(stripNode);
  if (isSchemaObject(node)) return stripRequired(node);
  return node;
}

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

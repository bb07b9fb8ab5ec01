/**
 * Application tests for the plan schema validator.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';

import {
  SchemaLoadError,
  SchemaValidator,
  stripRequired,
} from '../../src/plans/application/SchemaValidator';
import { buildPlan, loadPlanValidator } from '../support/planFixtures';

describe('SchemaValidator', () => {
  const validator = loadPlanValidator();

  describe('validate (full documents)', () => {
    it('accepts a complete plan', () => {
      expect(validator.validate(buildPlan())).toEqual({ valid: true });
    });

    it('rejects a plan missing a required top-level field', () => {
      const { objectType: _omitted, ...withoutType } = buildPlan();

      expect(validator.validate(withoutType)).toEqual({
        valid: false,
        issues: ["/ must have required property 'objectType'"],
      });
    });

    it('reports every violation, not only the first', () => {
      const result = validator.validate({
        ...buildPlan(),
        planType: 'premium',
        planCostShares: {
          deductible: 2000,
          _org: 'insurer.test',
          copay: 'free',
          objectId: 'mcs-101',
          objectType: 'membercostshare',
        },
      });

      expect(result.valid).toBe(false);
      if (result.valid) return;
      expect(result.issues).toHaveLength(2);
      expect(result.issues).toEqual(
        expect.arrayContaining([
          '/planType must be equal to one of the allowed values',
          '/planCostShares/copay must be number',
        ]),
      );
    });

    it('rejects a non-object document', () => {
      const result = validator.validate('not a plan');

      expect(result.valid).toBe(false);
      if (result.valid) return;
      expect(result.issues).toContain('/ must be object');
    });
  });

  describe('validatePartial (patch documents)', () => {
    it('accepts a document missing required top-level fields', () => {
      expect(validator.validatePartial({ planType: 'outOfNetwork' })).toEqual({ valid: true });
    });

    it('drops required fields at nested levels too', () => {
      expect(validator.validatePartial({ planCostShares: { copay: 5 } })).toEqual({ valid: true });
      expect(
        validator.validatePartial({ linkedPlanServices: [{ objectId: 'ps-9' }] }),
      ).toEqual({ valid: true });
    });

    it('still enforces types and enums', () => {
      expect(validator.validatePartial({ planCostShares: { copay: 'free' } })).toEqual({
        valid: false,
        issues: ['/planCostShares/copay must be number'],
      });
      expect(validator.validatePartial({ planType: 'premium' })).toEqual({
        valid: false,
        issues: ['/planType must be equal to one of the allowed values'],
      });
    });

    it('names unknown fields', () => {
      expect(validator.validatePartial({ colour: 'red' })).toEqual({
        valid: false,
        issues: ["/ must NOT have additional properties: 'colour'"],
      });
    });
  });

  describe('stripRequired', () => {
    it('removes required lists from every subschema keyword', () => {
      const stripped = stripRequired({
        type: 'object',
        required: ['a'],
        properties: {
          required: { type: 'string' },
          a: { type: 'object', required: ['b'], properties: { b: { type: 'string' } } },
        },
        items: [{ required: ['x'] }],
        anyOf: [{ required: ['y'] }],
        $defs: { thing: { required: ['z'] } },
      });

      expect(stripped).toEqual({
        type: 'object',
        properties: {
          required: { type: 'string' },
          a: { type: 'object', properties: { b: { type: 'string' } } },
        },
        items: [{}],
        anyOf: [{}],
        $defs: { thing: {} },
      });
    });
  });

  describe('fromFile', () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'plan-schema-'));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('fails with SchemaLoadError when the file is missing', () => {
      expect(() => SchemaValidator.fromFile(path.join(tmpDir, 'missing.json'))).toThrow(
        SchemaLoadError,
      );
    });

    it('fails with SchemaLoadError when the file is not JSON', () => {
      const schemaPath = path.join(tmpDir, 'broken.json');
      fs.writeFileSync(schemaPath, '{ "type": ');

      expect(() => SchemaValidator.fromFile(schemaPath)).toThrow(SchemaLoadError);
    });

    it('fails with SchemaLoadError when the schema does not compile', () => {
      const schemaPath = path.join(tmpDir, 'invalid.json');
      fs.writeFileSync(schemaPath, JSON.stringify({ type: 'no-such-type' }));

      expect(() => SchemaValidator.fromFile(schemaPath)).toThrow(SchemaLoadError);
    });
  });
});

import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { setLogLevel, standardize, validate } from '../src/index.js';

const FIXED_NOW = '2024-01-01T00:00:00.000Z';

const person = { id: 1, name: 'Person', description: 'A human person' };
const employee = { id: 3, name: 'Employee', description: null };

function aliceModel() {
  return {
    id: 1,
    title: 'Alice',
    body: 'Engineer',
    created_at: '2024-03-01T09:00:00.000Z',
    updated_at: '2024-03-02T09:00:00.000Z',
    model_type: { base_model: person, traits: [employee] },
  };
}

function aliceFull() {
  return {
    model: aliceModel(),
    attributes: { age: 28, active: true },
    relations: [
      {
        relation_id: 1,
        relation_name: 'works_for',
        direction: 'outgoing',
        other_model: {
          id: 2,
          title: 'Acme',
          body: null,
          created_at: '2024-03-01T09:00:00.000Z',
          updated_at: '2024-03-01T09:00:00.000Z',
          model_type: { base_model: { id: 2, name: 'Company', description: null }, traits: [] },
        },
        relation_attributes: { role: 'Engineer' },
      },
    ],
  };
}

describe('standardize', () => {
  let stderr: MockInstance<typeof console.error>;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(FIXED_NOW));
    setLogLevel('info');
    stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    stderr.mockRestore();
  });

  describe('totality', () => {
    it('should return the default entity for null', () => {
      expect(standardize('model_full', null)).toEqual({
        model: {
          id: 0,
          title: 'Unknown',
          body: null,
          created_at: FIXED_NOW,
          updated_at: FIXED_NOW,
          model_type: { base_model: { id: 0, name: 'Unknown', description: null }, traits: [] },
        },
        attributes: {},
        relations: [],
      });
    });

    it('should not throw for any non-object input', () => {
      for (const raw of [undefined, 42, 'text', [], true]) {
        expect(() => standardize('model_full', raw)).not.toThrow();
        expect(() => standardize('model', raw)).not.toThrow();
        expect(() => standardize('model_type', raw)).not.toThrow();
      }
    });

    it('should default missing model fields', () => {
      expect(standardize('model', { id: 7 })).toEqual({
        id: 7,
        title: 'Unknown',
        body: null,
        created_at: FIXED_NOW,
        updated_at: FIXED_NOW,
        model_type: { base_model: { id: 0, name: 'Unknown', description: null }, traits: [] },
      });
    });

    it('should default fields with the wrong type', () => {
      const model = standardize('model', { ...aliceModel(), id: 'one', title: 12 });

      expect(model.id).toBe(0);
      expect(model.title).toBe('Unknown');
      expect(model.body).toBe('Engineer');
    });

    it('should convert Date timestamps to ISO strings', () => {
      const model = standardize('model', {
        ...aliceModel(),
        created_at: new Date('2024-05-01T10:00:00.000Z'),
      });

      expect(model.created_at).toBe('2024-05-01T10:00:00.000Z');
    });

    it('should treat null attributes and relations as empty', () => {
      const result = standardize('model_full', { model: aliceModel(), attributes: null, relations: null });

      expect(result.attributes).toEqual({});
      expect(result.relations).toEqual([]);
    });
  });

  describe('malformed children', () => {
    it('should drop traits without a numeric id or a name', () => {
      const block = standardize('model_type', {
        base_model: person,
        traits: [employee, { name: 'NoId' }, { id: 9 }, 'Employee', null],
      });

      expect(block.traits).toEqual([employee]);
    });

    it('should drop relations with a bad direction or id', () => {
      const full = aliceFull();
      const result = standardize('model_full', {
        ...full,
        relations: [
          ...full.relations,
          { ...full.relations[0], relation_id: 2, direction: 'sideways' },
          { ...full.relations[0], relation_id: 'three' },
          'not a relation',
        ],
      });

      expect(result.relations.map(r => r.relation_id)).toEqual([1]);
    });

    it('should drop non-scalar attribute values and keep null', () => {
      const result = standardize('model_full', {
        ...aliceFull(),
        attributes: { age: 28, nickname: null, tags: ['a', 'b'], address: { city: 'Springfield' } },
      });

      expect(result.attributes).toEqual({ age: 28, nickname: null });
    });

    it('should strip unknown keys at every level', () => {
      const full = aliceFull();
      const result = standardize('model_full', {
        ...full,
        extra: true,
        model: { ...full.model, secret: 'x', model_type: { ...full.model.model_type, note: 1 } },
        relations: [{ ...full.relations[0], weight: 5 }],
      });

      expect(result).toEqual(aliceFull());
    });

    it('should keep an attribute keyed __proto__ as its own entry', () => {
      const raw: unknown = JSON.parse('{"__proto__": "x", "age": 28}');

      const attributes = standardize('model_full', { model: aliceModel(), attributes: raw, relations: [] }).attributes;

      expect(Object.entries(attributes)).toEqual([['__proto__', 'x'], ['age', 28]]);
      expect(Object.getPrototypeOf(attributes)).toBe(Object.prototype);
    });
  });

  describe('idempotence', () => {
    it('should leave an already canonical value unchanged', () => {
      expect(standardize('model_full', aliceFull())).toEqual(aliceFull());
    });

    it('should give the same result when applied twice', () => {
      const once = standardize('model_full', { model: { id: 4 }, relations: [{ relation_id: 1 }] });
      const twice = standardize('model_full', once);

      expect(twice).toEqual(once);
    });
  });

  describe('logging', () => {
    it('should warn about each missing field', () => {
      standardize('model', { ...aliceModel(), title: undefined });

      expect(stderr).toHaveBeenCalledWith('[standardize] WARN model.title invalid (undefined), using default');
    });

    it('should warn when a field is absent', () => {
      const { title: _, ...withoutTitle } = aliceModel();
      standardize('model', withoutTitle);

      expect(stderr).toHaveBeenCalledWith('[standardize] WARN model.title missing, using default');
    });

    it('should warn when a trait is dropped', () => {
      standardize('model_type', { base_model: person, traits: [{ name: 'NoId' }] });

      expect(stderr).toHaveBeenCalledWith(
        '[standardize] WARN model_type.traits[0] dropped: trait needs a numeric id and a name'
      );
    });

    it('should stay quiet for a canonical value', () => {
      standardize('model_full', aliceFull());

      expect(stderr).not.toHaveBeenCalled();
    });
  });
});

describe('validate', () => {
  beforeEach(() => {
    setLogLevel('silent');
  });

  it('should accept a canonical entity', () => {
    expect(validate('model_full', aliceFull())).toBe(true);
  });

  it('should reject a structure with missing fields', () => {
    expect(validate('model_full', { model: { id: 1 } })).toBe(false);
  });

  it('should reject unknown keys', () => {
    expect(validate('model', { ...aliceModel(), extra: 1 })).toBe(false);
  });

  it('should reject an unknown direction', () => {
    const full = aliceFull();
    expect(validate('model_full', { ...full, relations: [{ ...full.relations[0], direction: 'up' }] })).toBe(false);
  });

  it('should not modify its input', () => {
    const value = { model: { id: 1, extra: true }, attributes: { age: 28 } };
    const before = JSON.stringify(value);

    validate('model_full', value);

    expect(JSON.stringify(value)).toBe(before);
  });
});

/**
 * Unit tests for snapshot and restore
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { restoreNode, serializeConstraint, snapshotNode } from '../../src/snapshot/snapshot.js';
import { SNAPSHOT_FORMAT } from '../../src/snapshot/format.js';
import type { CatalogSnapshot, ValueCodec } from '../../src/snapshot/format.js';
import { ENTITY_SCHEMA, SchemaRegistry, defineEntitySchema } from '../../src/schema/entity-schema.js';
import { StructuredFieldNode } from '../../src/schema/structured-node.js';
import { Field } from '../../src/fields/field.js';
import { FieldNode } from '../../src/fields/field-node.js';
import { DerivedValue, ObservedValue } from '../../src/fields/field-value.js';
import { FieldType } from '../../src/fields/type-constraint.js';
import { Catalog } from '../../src/tree/catalog.js';
import { CatalogNode } from '../../src/tree/node.js';
import { Source, SourceRegistry } from '../../src/core/identity/source.js';
import { computeContentAddress } from '../../src/core/identity/content-address.js';
import { createRecordingLogger } from '../../src/core/logging/recording.js';
import type { RecordingLogger } from '../../src/core/logging/recording.js';
import { SnapshotError } from '../../src/core/errors.js';

const STAR = defineEntitySchema({
  name: 'star',
  extends: ENTITY_SCHEMA,
  fields: [
    { name: 'mass', type: FieldType.number, default: 1 },
    { name: 'radius', type: FieldType.number },
    {
      name: 'density',
      type: FieldType.number,
      derive: { dependencies: ['mass', 'radius'], compute: (m, r) => Number(m) / Number(r) ** 3 },
    },
  ],
});

class Probe extends CatalogNode {}

function roundTrip(snapshot: CatalogSnapshot): unknown {
  return JSON.parse(JSON.stringify(snapshot));
}

describe('Snapshots', () => {
  let logger: RecordingLogger;

  beforeEach(() => {
    logger = createRecordingLogger();
  });

  describe('snapshotNode', () => {
    it('should capture fields as plain data with a checksum', () => {
      const node = new FieldNode(undefined, [new Field('mass', { type: FieldType.number })]);
      node.field('mass').set('Smith 2009', 2.1);

      const snapshot = snapshotNode(node, { logger });

      expect(snapshot.format).toBe(SNAPSHOT_FORMAT);
      expect(snapshot.root).toEqual({
        kind: 'fields',
        fields: [
          {
            name: 'mass',
            type: { kind: 'primitive', name: 'number' },
            values: [{ source: 'Smith 2009', value: 2.1 }],
          },
        ],
        children: [],
      });
      expect(snapshot.checksum).toBe(computeContentAddress(snapshot.root));
    });

    it('should never include the parent and include children unless asked not to', () => {
      const catalog = new Catalog('survey');
      const parent = new FieldNode(catalog);
      new FieldNode(parent);

      expect(snapshotNode(parent).root.children).toHaveLength(1);
      expect(snapshotNode(parent, { includeChildren: false }).root.children).toEqual([]);
      expect(snapshotNode(catalog).root).toEqual({
        kind: 'catalog',
        name: 'survey',
        fields: [],
        children: [
          {
            kind: 'fields',
            fields: [],
            children: [{ kind: 'fields', fields: [], children: [] }],
          },
        ],
      });
    });

    it('should record source locations and codes', () => {
      const registry = new SourceRegistry();
      const field = new Field('distance', { registry });
      field.set(registry.intern('Lee 2015', '10.1086/345678'), 42);
      field.set('Kim 2013//2013ApJ...770....1K', 40);
      const node = new FieldNode(undefined, [field]);

      expect(snapshotNode(node).root.fields[0]?.values).toEqual([
        { source: 'Lee 2015', location: '10.1086/345678', value: 42 },
        { source: 'Kim 2013', code: '2013ApJ...770....1K', value: 40 },
      ]);
    });

    it('should drop ad-hoc derived values with a warning', () => {
      const derived = new DerivedValue(() => 6);
      const field = new Field('doubled');
      field.append(derived);
      field.set('Smith 2009', 3);
      const node = new FieldNode(undefined, [field]);

      const snapshot = snapshotNode(node, { logger });

      expect(snapshot.root.fields[0]?.values).toEqual([{ source: 'Smith 2009', value: 3 }]);
      expect(logger.byLevel('warn').map((entry) => entry.event_type)).toEqual(['snapshot_derived_dropped']);
      expect(logger.byLevel('warn')[0]?.metadata).toEqual({ field: 'doubled', source: derived.source().id });
    });

    it('should refuse ad-hoc derived values in fail mode', () => {
      const field = new Field('doubled');
      field.append(new DerivedValue(() => 6));
      const node = new FieldNode(undefined, [field]);

      expect(() => snapshotNode(node, { derived: 'fail' })).toThrow(SnapshotError);
    });

    it('should refuse values that are not JSON-compatible', () => {
      const field = new Field('observed');
      field.set('Smith 2009', new Date(Date.UTC(2009, 1, 1)));
      const node = new FieldNode(undefined, [field]);

      expect(() => snapshotNode(node)).toThrow('Value of field observed from Smith 2009 is not JSON-compatible');
    });

    it('should encode values through a codec', () => {
      const codec: ValueCodec = {
        encode: (value) => (value instanceof Date ? value.toISOString() : value),
        decode: (encoded) => encoded,
      };
      const field = new Field('observed');
      field.set('Smith 2009', new Date(Date.UTC(2009, 1, 1)));
      const node = new FieldNode(undefined, [field]);

      expect(snapshotNode(node, { codec }).root.fields[0]?.values).toEqual([
        { source: 'Smith 2009', value: '2009-02-01T00:00:00.000Z' },
      ]);
    });

    it('should omit type constraints that cannot be written as data', () => {
      const field = new Field('observed', { type: FieldType.instanceOf(Date) });
      const node = new FieldNode(undefined, [field]);

      const snapshot = snapshotNode(node, { logger });

      expect(snapshot.root.fields[0]?.type).toBeUndefined();
      expect(logger.byLevel('warn')[0]?.event_type).toBe('snapshot_type_omitted');
      expect(logger.byLevel('warn')[0]?.metadata).toEqual({ field: 'observed', type: 'Date' });
    });

    it('should refuse unknown node types', () => {
      expect(() => snapshotNode(new Probe())).toThrow('Cannot snapshot Probe: unsupported node type');
    });
  });

  describe('serializeConstraint', () => {
    it('should write nested data constraints and refuse the rest', () => {
      expect(serializeConstraint(FieldType.oneOf(FieldType.arrayOf(FieldType.number), FieldType.string))).toEqual({
        kind: 'one-of',
        options: [
          { kind: 'array', element: { kind: 'primitive', name: 'number' } },
          { kind: 'primitive', name: 'string' },
        ],
      });
      expect(serializeConstraint(FieldType.arrayOf(FieldType.typedArray(Float64Array)))).toBeUndefined();
      expect(serializeConstraint(FieldType.predicate(() => true))).toBeUndefined();
    });
  });

  describe('restoreNode', () => {
    let schemas: SchemaRegistry;
    let catalog: Catalog;
    let vega: StructuredFieldNode;

    beforeEach(() => {
      schemas = new SchemaRegistry([STAR]);
      catalog = new Catalog('survey');
      vega = new StructuredFieldNode(STAR, catalog, { name: 'Vega' });
      vega.set('mass', 16, 'Smith 2009');
      const notes = new FieldNode(vega, [new Field('note')]);
      notes.set('note', 'variable', 'Jones 2011');
    });

    it('should restore observed values and rebuild schema derivations', () => {
      const restored = restoreNode(roundTrip(snapshotNode(catalog)), { schemas });

      expect(restored).toBeInstanceOf(Catalog);
      expect(restored.describe()).toBe('Catalog survey');
      expect(restored.countNodes()).toBe(3);

      const star = restored.children[0];
      expect(star).toBeInstanceOf(StructuredFieldNode);
      if (!(star instanceof StructuredFieldNode)) {
        return;
      }
      expect(star.get('name')).toBe('Vega');
      expect(star.field('mass').sourceNames()).toEqual(['Smith 2009', '<default>']);
      expect(star.field('mass').values()).toEqual([16, 1]);
      expect(star.field('mass').get('Smith 2009').source()).toBe(Source.of('Smith 2009'));
      expect(star.derivationIndex('density')).toBe(0);
      expect(star.alteredStructure).toBe(false);

      star.set('radius', 2);
      expect(star.get('density')).toBe(2);

      const notes = star.children[0];
      expect(notes instanceof FieldNode && notes.get('note')).toBe('variable');
    });

    it('should come back detached', () => {
      const restored = restoreNode(snapshotNode(vega), { schemas });

      expect(restored.parent).toBeUndefined();
      expect(catalog.children).toEqual([vega]);
    });

    it('should keep the altered flag', () => {
      vega.addField(new Field('luminosity'));

      const restored = restoreNode(snapshotNode(vega), { schemas });

      expect(restored instanceof StructuredFieldNode && restored.alteredStructure).toBe(true);
      expect(restored instanceof StructuredFieldNode && restored.fieldNames).toEqual([
        'name',
        'mass',
        'radius',
        'density',
        'luminosity',
      ]);
    });

    it('should intern sources in the given registry', () => {
      const registry = new SourceRegistry();

      const restored = restoreNode(snapshotNode(vega), { schemas, registry });

      expect(registry.ids()).toEqual(['Smith 2009', 'Jones 2011']);
      expect(restored instanceof StructuredFieldNode && restored.field('mass').get(0).source()).toBe(
        registry.get('Smith 2009')
      );
    });

    it('should restore source locations', () => {
      const registry = new SourceRegistry();
      const field = new Field('distance', { registry });
      field.set(registry.intern('Lee 2015', '10.1086/345678'), 42);
      const snapshot = snapshotNode(new FieldNode(undefined, [field]));

      const target = new SourceRegistry();
      restoreNode(snapshot, { registry: target });

      expect(target.get('Lee 2015')?.location).toBe('10.1086/345678');
    });

    it('should restore several values from one source', () => {
      const field = new Field('mass');
      field.set('Smith 2009', 1);
      field.append(new ObservedValue(2, 'Smith 2009'), { checkSource: false });

      const restored = restoreNode(roundTrip(snapshotNode(new FieldNode(undefined, [field]))), {
        registry: new SourceRegistry(),
      });

      expect(restored instanceof FieldNode && restored.field('mass').values()).toEqual([1, 2]);
      expect(restored instanceof FieldNode && restored.field('mass').sourceNames()).toEqual([
        'Smith 2009',
        'Smith 2009',
      ]);
    });

    it('should fail when a schema is not registered', () => {
      expect(() => restoreNode(snapshotNode(catalog))).toThrow(
        'No entity schema registered for structured node "star"'
      );
    });

    it('should detect a checksum mismatch', () => {
      const snapshot = snapshotNode(catalog);
      const tampered = { ...snapshot, root: { ...snapshot.root, name: 'other survey' } };

      expect(() => restoreNode(tampered, { schemas })).toThrow('Snapshot checksum does not match its content');
    });

    it('should reject malformed snapshots', () => {
      expect(() => restoreNode({ format: 2, checksum: 'sha256:00', root: {} })).toThrow(SnapshotError);
      expect(() => restoreNode('not a snapshot')).toThrow(/^Malformed snapshot: /);
    });

    it('should wrap value errors in a snapshot error', () => {
      const root = {
        kind: 'fields',
        fields: [
          {
            name: 'mass',
            type: { kind: 'primitive', name: 'number' },
            values: [{ source: 'Smith 2009', value: 'heavy' }],
          },
        ],
        children: [],
      };
      const snapshot = { format: SNAPSHOT_FORMAT, checksum: computeContentAddress(root), root };

      expect(() => restoreNode(snapshot)).toThrow(/^Cannot restore field mass: /);
    });
  });
});

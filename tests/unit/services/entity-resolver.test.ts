/**
 * EntityResolver tests
 * Cache behaviour, find-or-create against the destination and id handling
 */

import { TransactionContext } from '../../../src/lib/database-connections';
import { Logger, MissingIdentifierError } from '../../../src/lib/error-handler';
import { EntityResolver, extractId } from '../../../src/services/entity-resolver';
import { SchemaBuilder } from '../../../src/services/schema-builder';
import { DictionarySexInferrer, SexInferrer } from '../../../src/services/sex-inference';
import { FakeDestination, FakeDestinationOptions } from '../../helpers/fake-destination';

describe('extractId', () => {
  test('should read an integer id from the first row', () => {
    expect(extractId([{ id: 12 }, { id: 13 }])).toBe(12);
  });

  test('should parse BIGINT ids delivered as strings', () => {
    expect(extractId([{ id: '9007199254' }])).toBe(9007199254);
  });

  test('should return null when there is no usable id', () => {
    expect(extractId([])).toBeNull();
    expect(extractId([{ id: null }])).toBeNull();
    expect(extractId([{ id: 1.5 }])).toBeNull();
    expect(extractId([{ id: 'abc' }])).toBeNull();
    expect(extractId([{ other: 1 }])).toBeNull();
  });
});

describe('EntityResolver', () => {
  const logger = new Logger({ enableConsole: false, enableFile: false });

  async function openResolver(
    options: FakeDestinationOptions = {},
    inferrer: SexInferrer = new DictionarySexInferrer()
  ): Promise<{ destination: FakeDestination; tx: TransactionContext; resolver: EntityResolver }> {
    const destination = new FakeDestination(options);
    const tx = await destination.beginTransaction();
    await new SchemaBuilder(logger).recreate(tx.executor);
    destination.statements.length = 0;
    return { destination, tx, resolver: new EntityResolver(tx.executor, inferrer, logger) };
  }

  describe('resolvePatient', () => {
    test('should insert a new patient with normalized names and inferred sex', async () => {
      const { destination, tx, resolver } = await openResolver();

      const id = await resolver.resolvePatient(' 100 ', '  maria   jose ', 'gomez  ');
      await tx.commit();

      expect(id).toBe(1);
      expect(destination.tables.patient).toEqual([
        { id: 1, first_name: 'MARIA JOSE', last_name: 'GOMEZ', document_number: '100', inferred_sex: 'female' }
      ]);
    });

    test('should serve repeated document numbers from the cache', async () => {
      const { destination, resolver } = await openResolver();

      const first = await resolver.resolvePatient('100', 'juan', 'perez');
      const second = await resolver.resolvePatient('100', 'someone', 'else');

      expect(second).toBe(first);
      expect(destination.statements.filter(text => text.startsWith('SELECT id FROM patient'))).toHaveLength(1);
      expect(destination.statements.filter(text => text.startsWith('INSERT INTO patient'))).toHaveLength(1);
      expect(resolver.getCacheStats()).toEqual({ patients: 1, services: 0 });
    });

    test('should use an existing destination row without inserting', async () => {
      const { destination, tx } = await openResolver();
      await tx.executor.query(
        'INSERT INTO patient (first_name, last_name, document_number, inferred_sex) VALUES ($1, $2, $3, $4) RETURNING id',
        ['ANA', 'LOPEZ', '200', 'female']
      );
      const resolver = new EntityResolver(tx.executor, new DictionarySexInferrer(), logger);
      destination.statements.length = 0;

      const id = await resolver.resolvePatient('200', 'other', 'name');

      expect(id).toBe(1);
      expect(destination.statements).toEqual(['SELECT id FROM patient WHERE document_number = $1']);
    });

    test('should store null sex when the first name is unknown', async () => {
      const { destination, tx, resolver } = await openResolver();

      await resolver.resolvePatient('300', 'xochitl', 'ruiz');
      await tx.commit();

      expect(destination.tables.patient?.[0].inferred_sex).toBeNull();
    });

    test('should store null sex when inference throws', async () => {
      const failing: SexInferrer = {
        infer: () => {
          throw new Error('detector crashed');
        }
      };
      const { destination, tx, resolver } = await openResolver({}, failing);

      const id = await resolver.resolvePatient('400', 'pedro', 'diaz');
      await tx.commit();

      expect(id).toBe(1);
      expect(destination.tables.patient?.[0].inferred_sex).toBeNull();
    });

    test('should throw MissingIdentifierError when the insert returns no id', async () => {
      const { resolver } = await openResolver({ withholdIdsFor: ['patient'] });

      await expect(resolver.resolvePatient('500', 'luis', 'sosa')).rejects.toThrow(MissingIdentifierError);
      expect(resolver.getCacheStats().patients).toBe(0);
    });
  });

  describe('resolveService', () => {
    test('should create each service once and reuse its id', async () => {
      const { destination, tx, resolver } = await openResolver();

      const consult = await resolver.resolveService('Consult');
      const lab = await resolver.resolveService('Lab');
      const consultAgain = await resolver.resolveService('  Consult ');
      await tx.commit();

      expect([consult, lab, consultAgain]).toEqual([1, 2, 1]);
      expect(destination.tables.service).toEqual([
        { id: 1, name: 'Consult' },
        { id: 2, name: 'Lab' }
      ]);
      expect(resolver.getCacheStats()).toEqual({ patients: 0, services: 2 });
    });

    test('should keep service names case-sensitive', async () => {
      const { resolver } = await openResolver();

      const upper = await resolver.resolveService('LAB');
      const lower = await resolver.resolveService('lab');

      expect(upper).not.toBe(lower);
    });

    test('should throw MissingIdentifierError naming the service', async () => {
      const { resolver } = await openResolver({ withholdIdsFor: ['service'] });

      await expect(resolver.resolveService('Consult')).rejects.toMatchObject({
        errorCode: 'MISSING_GENERATED_ID',
        context: { entity: 'service', name: 'Consult' }
      });
    });

    test('should propagate destination errors', async () => {
      const { resolver } = await openResolver({
        failures: [{ statementStartsWith: 'SELECT id FROM service', error: new Error('connection reset') }]
      });

      await expect(resolver.resolveService('Consult')).rejects.toThrow('connection reset');
    });
  });
});

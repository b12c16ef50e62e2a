import * as fc from 'fast-check';
import { IdentifierDeriver, titleCase } from './identifier-deriver';
import { componentIdArb, idFieldArb, majorVersionArb } from '../test/generators';

describe('IdentifierDeriver', () => {
  describe('titleCase', () => {
    it('should turn dashes into spaces and capitalise each word', () => {
      expect(titleCase('sales-and-marketing')).toBe('Sales And Marketing');
      expect(titleCase('ACME')).toBe('Acme');
    });

    it('should capitalise accented letters at word starts', () => {
      expect(titleCase('ñandu-éclair')).toBe('Ñandu Éclair');
      expect(titleCase('área-sul')).toBe('Área Sul');
    });
  });

  describe('dataSourceId', () => {
    it('should combine the component scope with the dependency component path', () => {
      const id = IdentifierDeriver.dataSourceId(
        { id: 'urn:dmb:cmp:acme:sales:1:sink' },
        { id: 'urn:dmb:cmp:acme:sales:1:storage:raw' }
      );

      expect(id).toBe('acme_sales_1_datasource_storage_raw');
    });

    /**
     * The data source is looked up by this id on every run, so it must only
     * depend on the two component ids.
     */
    it('should be deterministic and built from fixed id positions', () => {
      fc.assert(
        fc.property(
          idFieldArb(),
          idFieldArb(),
          majorVersionArb(),
          fc.array(idFieldArb(), { minLength: 1, maxLength: 2 }),
          componentIdArb(),
          (domain, product, major, path, dependencyId) => {
            const component = { id: ['urn', 'dmb', 'cmp', domain, product, major, ...path].join(':') };
            const dependency = { id: dependencyId };

            const first = IdentifierDeriver.dataSourceId(component, dependency);
            const second = IdentifierDeriver.dataSourceId(component, dependency);
            const dependencyPath = dependencyId.split(':').slice(6);

            expect(first).toBe(second);
            expect(first).toBe([domain, product, major, 'datasource', ...dependencyPath].join('_'));
          }
        ),
        { numRuns: 100 }
      );
    });
  });

  describe('fullyQualifiedName', () => {
    it('should derive the display name from the component id', () => {
      const name = IdentifierDeriver.fullyQualifiedName({
        id: 'urn:dmb:cmp:finance:sales-and-marketing:2:sink',
        name: 'Revenue Port'
      });

      expect(name).toBe('Finance - Sales And Marketing - V2 - Revenue Port');
    });

    it('should title-case accented domains', () => {
      const name = IdentifierDeriver.fullyQualifiedName({ id: 'urn:dmb:cmp:área-sul:vendas:1:x', name: 'X' });

      expect(name).toBe('Área Sul - Vendas - V1 - X');
    });

    it('should reject ids that are too short', () => {
      expect(() => IdentifierDeriver.fullyQualifiedName({ id: 'urn:dmb:cmp:finance', name: 'Port' })).toThrow(
        'Component id urn:dmb:cmp:finance has no field at position 4'
      );
    });
  });

  describe('dataSourceName', () => {
    it('should prefer the declared fully qualified name', () => {
      const name = IdentifierDeriver.dataSourceName(
        { id: 'urn:dmb:cmp:acme:sales:1:sink', name: 'Sink', fullyQualifiedName: 'Acme Sales Sink' },
        { name: 'Raw Storage' }
      );

      expect(name).toBe('Acme Sales Sink - Data Source - Raw Storage');
    });

    it('should fall back to the derived name', () => {
      const name = IdentifierDeriver.dataSourceName(
        { id: 'urn:dmb:cmp:acme:sales:1:sink', name: 'Sink', fullyQualifiedName: null },
        { name: 'Raw Storage' }
      );

      expect(name).toBe('Acme - Sales - V1 - Sink - Data Source - Raw Storage');
    });
  });
});

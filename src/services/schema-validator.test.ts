import { SchemaValidator } from './schema-validator';

describe('SchemaValidator', () => {
  const validator = new SchemaValidator();

  describe('validateWorkspaceSpec', () => {
    it('should accept a minimal specific section', () => {
      const result = validator.validateWorkspaceSpec({
        workspaceId: 'sales-ws',
        workspaceName: 'Sales',
        workspaceLayout: {}
      });

      expect(result.valid).toBe(true);
      expect(result.parsedOutput?.workspaceId).toBe('sales-ws');
    });

    it('should list every problem', () => {
      const result = validator.validateWorkspaceSpec({
        workspaceName: 42,
        workspaceLayout: {}
      });

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        "must have required property 'workspaceId'",
        '/workspaceName must be string'
      ]);
    });

    it('should check user data filters', () => {
      const result = validator.validateWorkspaceSpec({
        workspaceId: 'sales-ws',
        workspaceName: 'Sales',
        workspaceLayout: {},
        userDataFilters: [{ id: 'f1', title: 'EMEA', user: 'user:a_b.com', label: 'region' }]
      });

      expect(result.errors).toEqual(["/userDataFilters/0 must have required property 'value'"]);
    });
  });

  describe('validateDataProduct', () => {
    it('should fill in defaults for components', () => {
      const result = validator.validateDataProduct({
        id: 'dp',
        dataProductOwner: 'user:a_b.com',
        devGroup: 'group:devs',
        components: [{ id: 'c1', name: 'C1', kind: 'workload' }]
      });

      expect(result.parsedOutput?.components[0].dependsOn).toEqual([]);
      expect(result.parsedOutput?.components[0].specific).toEqual({});
    });
  });

  describe('roundTripWorkspaceLayout', () => {
    it('should accept a layout the platform model fully covers', () => {
      const layout = {
        ldm: { datasets: [{ id: 'orders' }], dateInstances: [] },
        analytics: { metrics: [{ id: 'revenue', content: { maql: 'SELECT 1' } }] }
      };

      const result = validator.roundTripWorkspaceLayout(layout);

      expect(result).toEqual({ parsed: true, consistent: true, errors: [], model: layout });
    });

    it('should flag properties the platform model drops', () => {
      const layout = { ldm: { datasets: [], unknownSection: [] } };

      const result = validator.roundTripWorkspaceLayout(layout);

      expect(result.parsed).toBe(true);
      expect(result.consistent).toBe(false);
      expect(result.model).toEqual({ ldm: { datasets: [] } });
      expect(layout.ldm.unknownSection).toEqual([]);
    });

    it('should fail to parse content of the wrong type', () => {
      const result = validator.roundTripWorkspaceLayout({ analytics: { metrics: 'revenue' } });

      expect(result.parsed).toBe(false);
      expect(result.errors).toEqual(['/analytics/metrics must be array']);
    });
  });
});

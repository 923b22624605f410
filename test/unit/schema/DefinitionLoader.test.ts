import { describe, beforeAll, beforeEach, afterEach, test, expect } from '@jest/globals';
import { promises as fs } from 'fs';
import * as path from 'path';
import * as os from 'os';
import { DefinitionLoader, DEFAULT_DEFINITIONS_PATH } from '../../../src/schema/DefinitionLoader';
import { SchemaDefinitionError } from '../../../src/common/errors';
import { declareAlertSummary } from '../../fixtures/definitions';

describe('DefinitionLoader', () => {
  let loader: DefinitionLoader;
  let bundledYaml: string;

  beforeAll(async () => {
    bundledYaml = await fs.readFile(DEFAULT_DEFINITIONS_PATH, 'utf8');
  });

  beforeEach(() => {
    loader = new DefinitionLoader();
  });

  describe('parseFromYaml', () => {
    test('should parse the bundled document', () => {
      const definition = loader.parseFromYaml(bundledYaml);

      expect(definition.namespace).toBe('performance_monitoring');
      expect(definition.version).toBe('0.3');
      expect(definition.objects.size).toBe(3);

      const node = definition.objects.get('NodeSummary');
      expect(node?.keyAttribute).toBe('node_id');
      expect(node?.valueTemplate).toBe('monitoring/summary/nodes/$NodeSummary.node_id');
      expect(node?.listingKey).toBe('monitoring/summary/nodes');
      expect(node?.help).toBe('Node Summary');
      expect(node?.enabled).toBe(true);
    });

    test('should accept a quoted version string', () => {
      const definition = loader.parseFromYaml(bundledYaml.replace('tendrl_schema_version: 0.3', 'tendrl_schema_version: "0.3.1"'));
      expect(definition.version).toBe('0.3.1');
    });

    test('should keep the version marker as written', () => {
      const major = loader.parseFromYaml(bundledYaml.replace('tendrl_schema_version: 0.3', 'tendrl_schema_version: 1.0'));
      const twoDigitMinor = loader.parseFromYaml(bundledYaml.replace('tendrl_schema_version: 0.3', 'tendrl_schema_version: 0.10'));

      expect(major.version).toBe('1.0');
      expect(twoDigitMinor.version).toBe('0.10');
    });

    test('should default enabled to true and help to empty', () => {
      const yaml = bundledYaml
        .replace('      enabled: true\n      value: monitoring/summary/nodes', '      value: monitoring/summary/nodes')
        .replace('      help: "Node Summary"\n', '');
      const node = loader.parseFromYaml(yaml).objects.get('NodeSummary');

      expect(node?.enabled).toBe(true);
      expect(node?.help).toBe('');
    });

    test('should reject invalid YAML', () => {
      expect(() => loader.parseFromYaml('objects: [unclosed')).toThrow(SchemaDefinitionError);
    });

    test('should reject a document without a namespace section', () => {
      expect(() => loader.parseFromYaml('tendrl_schema_version: 0.3\n')).toThrow(
        'Expected exactly one namespace section, found 0'
      );
    });

    test('should require the version marker', () => {
      const yaml = bundledYaml.replace('tendrl_schema_version: 0.3', '');
      expect(() => loader.parseFromYaml(yaml)).toThrow('tendrl_schema_version is required');
    });

    test('should reject unknown type tags', () => {
      const yaml = bundledYaml.replace('alert_count:\n          type: int', 'alert_count:\n          type: Float');
      expect(() => loader.parseFromYaml(yaml)).toThrow("NodeSummary.attrs.alert_count has unsupported type 'Float'");
    });

    test('should reject a value template outside the list key', () => {
      const yaml = bundledYaml.replace(
        'value: monitoring/summary/system/$SystemSummary.sds_type',
        'value: monitoring/summary/systems/$SystemSummary.sds_type'
      );
      expect(() => loader.parseFromYaml(yaml)).toThrow(
        "SystemSummary.value must start with its list key 'monitoring/summary/system'"
      );
    });

    test('should reject a value template naming another object', () => {
      const yaml = bundledYaml.replace('$ClusterSummary.cluster_id', '$NodeSummary.cluster_id');
      expect(() => loader.parseFromYaml(yaml)).toThrow("ClusterSummary.value refers to another object 'NodeSummary'");
    });

    test('should reject a value template using an undeclared attribute', () => {
      const yaml = bundledYaml.replace('$NodeSummary.node_id', '$NodeSummary.fqdn');
      expect(() => loader.parseFromYaml(yaml)).toThrow("NodeSummary.value uses undeclared attribute 'fqdn'");
    });

    test('should reject a value template on a non-string attribute', () => {
      const yaml = bundledYaml.replace('$NodeSummary.node_id', '$NodeSummary.alert_count');
      expect(() => loader.parseFromYaml(yaml)).toThrow("NodeSummary.value attribute 'alert_count' must be a String");
    });

    test('should load objects declared ahead of their producers', () => {
      const definition = loader.parseFromYaml(declareAlertSummary(bundledYaml));
      const alert = definition.objects.get('AlertSummary');

      expect(definition.objects.size).toBe(4);
      expect(alert?.enabled).toBe(false);
      expect(alert?.keyAttribute).toBe('alert_id');
      expect(alert?.listingKey).toBe('monitoring/summary/alerts');
      expect(alert?.help).toBe('Alert Summary');
    });

    test('should require each typed summary object', () => {
      const yaml = `${bundledYaml.slice(0, bundledYaml.indexOf('    SystemSummary:'))}tendrl_schema_version: 0.3\n`;
      expect(() => loader.parseFromYaml(yaml)).toThrow("Object 'SystemSummary' is not declared");
    });

    test('should name the source in errors', () => {
      expect(() => loader.parseFromYaml('- a\n- b\n', 'defs.yaml')).toThrow('Definition document must be a mapping (defs.yaml)');
    });
  });

  describe('loadFromFile', () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'definition-loader-test-'));
    });

    afterEach(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    test('should load the bundled document by default', async () => {
      const definition = await loader.loadFromFile();
      expect(definition.source).toBe(bundledYaml);
    });

    test('should load a document from disk', async () => {
      const filePath = path.join(tempDir, 'definitions.yaml');
      await fs.writeFile(filePath, bundledYaml.replace('help: "System Summary"', 'help: "Deployment rollup"'), 'utf8');

      const definition = await loader.loadFromFile(filePath);
      expect(definition.objects.get('SystemSummary')?.help).toBe('Deployment rollup');
    });

    test('should wrap a missing file in SchemaDefinitionError', async () => {
      const filePath = path.join(tempDir, 'missing.yaml');
      await expect(loader.loadFromFile(filePath)).rejects.toThrow(SchemaDefinitionError);
      await expect(loader.loadFromFile(filePath)).rejects.toThrow('Failed to read schema definitions');
    });
  });
});

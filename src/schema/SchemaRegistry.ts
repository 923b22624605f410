import { KeyDerivationError, SchemaVersionMismatchError, UnknownObjectError } from '../common/errors';
import { deepFreeze, isValidKeyComponent } from '../common/utils';
import { createLogger, LoggingConfig } from '../common/logger';
import { DefinitionLoader, DEFAULT_DEFINITIONS_PATH } from './DefinitionLoader';
import { checkVersionCompatibility } from './version';
import {
  AttributeDefinition,
  CompatibilityResult,
  ObjectDefinition,
  ParsedKey,
  SchemaDefinition,
  VersionPolicy
} from './types';

/**
 * Read an own property of a record without widening it to an index signature
 */
export function readAttribute(record: object, name: string): unknown {
  return Object.prototype.hasOwnProperty.call(record, name) ? Reflect.get(record, name) : undefined;
}

/**
 * SchemaRegistry - canonical mapping from summary object name to its key layout,
 * attribute set, help text and enabled flag.
 *
 * Instances are immutable once constructed and are handed to producers and
 * consumers explicitly; there is no process-wide registry.
 */
export class SchemaRegistry {
  readonly namespace: string;
  readonly version: string;
  private readonly objects: ReadonlyMap<string, ObjectDefinition>;
  private readonly source: string;

  constructor(definition: SchemaDefinition) {
    this.namespace = definition.namespace;
    this.version = definition.version;
    this.source = definition.source;

    const objects = new Map<string, ObjectDefinition>();
    for (const [name, objectDefinition] of definition.objects) {
      objects.set(name, deepFreeze({ ...objectDefinition, attributes: [...objectDefinition.attributes] }));
    }
    this.objects = objects;
    Object.freeze(this);
  }

  /**
   * Build a registry from a definition document on disk (the bundled one by default)
   */
  static async fromFile(filePath: string = DEFAULT_DEFINITIONS_PATH, logging?: LoggingConfig): Promise<SchemaRegistry> {
    const definition = await new DefinitionLoader(logging).loadFromFile(filePath);
    const registry = new SchemaRegistry(definition);
    createLogger(logging).registry(`Registry ready with ${registry.getObjectNames().join(', ')}`);
    return registry;
  }

  /**
   * Build a registry from YAML text
   */
  static fromYaml(content: string, logging?: LoggingConfig): SchemaRegistry {
    return new SchemaRegistry(new DefinitionLoader(logging).parseFromYaml(content));
  }

  getObjectNames(): string[] {
    return Array.from(this.objects.keys());
  }

  hasObject(name: string): boolean {
    return this.objects.has(name);
  }

  /**
   * Get an object definition by name
   */
  getObject(name: string): ObjectDefinition {
    const definition = this.objects.get(name);
    if (!definition) {
      throw new UnknownObjectError(name);
    }
    return definition;
  }

  getAttributes(name: string): readonly AttributeDefinition[] {
    return this.getObject(name).attributes;
  }

  getKeyAttribute(name: string): string {
    return this.getObject(name).keyAttribute;
  }

  getListingKey(name: string): string {
    return this.getObject(name).listingKey;
  }

  getHelp(name: string): string {
    return this.getObject(name).help;
  }

  isEnabled(name: string): boolean {
    return this.getObject(name).enabled;
  }

  getEnabledObjects(): ObjectDefinition[] {
    return Array.from(this.objects.values()).filter(definition => definition.enabled);
  }

  /**
   * Singular key for an instance whose unique component is already known
   */
  deriveKeyFromId(name: string, id: unknown): string {
    const definition = this.getObject(name);
    if (id === undefined || id === null) {
      throw new KeyDerivationError(definition.name, definition.keyAttribute, 'is missing');
    }
    if (typeof id !== 'string') {
      throw new KeyDerivationError(definition.name, definition.keyAttribute, 'must be a string');
    }
    if (id.includes('/')) {
      throw new KeyDerivationError(definition.name, definition.keyAttribute, `must not contain '/' (got '${id}')`);
    }
    if (!isValidKeyComponent(id)) {
      throw new KeyDerivationError(definition.name, definition.keyAttribute, 'must not be empty');
    }
    return `${definition.listingKey}/${id}`;
  }

  /**
   * Singular key for an instance, taken from its identifying attribute
   */
  deriveKey(name: string, attributes: object): string {
    const definition = this.getObject(name);
    return this.deriveKeyFromId(definition.name, readAttribute(attributes, definition.keyAttribute));
  }

  /**
   * Which object and instance a singular key names; undefined for foreign keys
   */
  parseKey(key: string): ParsedKey | undefined {
    for (const definition of this.objects.values()) {
      const prefix = `${definition.listingKey}/`;
      if (key.startsWith(prefix)) {
        const id = key.slice(prefix.length);
        if (isValidKeyComponent(id)) {
          return { objectName: definition.name, id };
        }
      }
    }
    return undefined;
  }

  isInstanceKey(name: string, key: string): boolean {
    const definition = this.getObject(name);
    return this.parseKey(key)?.objectName === definition.name;
  }

  checkCompatibility(expected: string, policy: VersionPolicy = 'exact'): CompatibilityResult {
    return checkVersionCompatibility(expected, this.version, policy);
  }

  /**
   * Throws SchemaVersionMismatchError unless the expected version is satisfied
   */
  assertCompatible(expected: string, policy: VersionPolicy = 'exact'): void {
    const result = this.checkCompatibility(expected, policy);
    if (!result.compatible) {
      throw new SchemaVersionMismatchError(expected, this.version, result.reason ?? 'incompatible');
    }
  }

  /**
   * The definition document this registry was built from
   */
  getSource(): string {
    return this.source;
  }
}

import * as yaml from 'js-yaml';
import { promises as fs } from 'fs';
import * as path from 'path';
import { SchemaDefinitionError } from '../common/errors';
import { isPlainObject } from '../common/utils';
import { createLogger, LoggingConfig, SummaryLogger } from '../common/logger';
import {
  ATTRIBUTE_TYPE_TAGS,
  AttributeDefinition,
  AttributeTypeTag,
  OBJECT_NAMES,
  ObjectDefinition,
  SchemaDefinition
} from './types';

/**
 * Definition document bundled with the package
 */
export const DEFAULT_DEFINITIONS_PATH = path.resolve(__dirname, '../../definitions/performance_monitoring.yaml');

export const SCHEMA_VERSION_FIELD = 'tendrl_schema_version';

const NAMESPACE_PREFIX = 'namespace.';
const VALUE_TEMPLATE_PATTERN = /^(.+)\/\$([A-Za-z][A-Za-z0-9]*)\.([A-Za-z_][A-Za-z0-9_]*)$/;

function isTypeTag(value: unknown): value is AttributeTypeTag {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(ATTRIBUTE_TYPE_TAGS, value);
}

/**
 * Reads the YAML definition document and turns it into a checked SchemaDefinition.
 *
 * The document keeps the layout the agents already publish: one
 * `namespace.<name>` section holding `objects`, plus a top-level version marker.
 * Objects beyond the typed summaries may be declared, usually with
 * `enabled: false` until their producers ship.
 */
export class DefinitionLoader {
  private readonly logger: SummaryLogger;

  constructor(logging?: LoggingConfig) {
    this.logger = createLogger(logging);
  }

  /**
   * Load and parse a definition document from disk
   */
  async loadFromFile(filePath: string = DEFAULT_DEFINITIONS_PATH): Promise<SchemaDefinition> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new SchemaDefinitionError(`Failed to read schema definitions: ${errorMessage}`, filePath);
    }

    const definition = this.parseFromYaml(content, filePath);
    this.logger.registry(`Loaded schema ${definition.namespace} v${definition.version} from ${filePath}`);
    return definition;
  }

  /**
   * Parse YAML content into a schema definition
   */
  parseFromYaml(content: string, source?: string): SchemaDefinition {
    let parsed: unknown;
    let versionLiteral: unknown;
    try {
      parsed = yaml.load(content);
      versionLiteral = this.readVersionLiteral(content);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new SchemaDefinitionError(`Failed to parse schema definitions: ${errorMessage}`, source);
    }
    return this.parseDocument(parsed, versionLiteral, content, source);
  }

  /**
   * The version marker exactly as written; the default schema would read 1.0 as the number 1
   */
  private readVersionLiteral(content: string): unknown {
    const literal = yaml.load(content, { schema: yaml.FAILSAFE_SCHEMA });
    return isPlainObject(literal) ? literal[SCHEMA_VERSION_FIELD] : undefined;
  }

  private parseDocument(document: unknown, versionLiteral: unknown, content: string, source?: string): SchemaDefinition {
    if (!isPlainObject(document)) {
      throw new SchemaDefinitionError('Definition document must be a mapping', source);
    }

    const namespaceKeys = Object.keys(document).filter(key => key.startsWith(NAMESPACE_PREFIX));
    if (namespaceKeys.length !== 1) {
      throw new SchemaDefinitionError(`Expected exactly one namespace section, found ${namespaceKeys.length}`, source);
    }
    const namespaceKey = namespaceKeys[0];
    const namespaceSection = document[namespaceKey];
    const declared = isPlainObject(namespaceSection) ? namespaceSection.objects : undefined;
    if (!isPlainObject(declared)) {
      throw new SchemaDefinitionError(`${namespaceKey}.objects must be a mapping`, source);
    }

    const version = this.parseVersion(versionLiteral, source);

    const objects = new Map<string, ObjectDefinition>();
    for (const [name, raw] of Object.entries(declared)) {
      objects.set(name, this.parseObject(name, raw, source));
    }

    for (const name of OBJECT_NAMES) {
      if (!objects.has(name)) {
        throw new SchemaDefinitionError(`Object '${name}' is not declared`, source);
      }
    }

    return {
      namespace: namespaceKey.slice(NAMESPACE_PREFIX.length),
      version,
      objects,
      source: content
    };
  }

  private parseVersion(raw: unknown, source?: string): string {
    if (typeof raw === 'string' && raw.trim().length > 0) {
      return raw.trim();
    }
    throw new SchemaDefinitionError(`${SCHEMA_VERSION_FIELD} is required`, source);
  }

  private parseObject(name: string, raw: unknown, source?: string): ObjectDefinition {
    if (!isPlainObject(raw)) {
      throw new SchemaDefinitionError(`${name} must be a mapping`, source);
    }
    const { attrs } = raw;
    if (!isPlainObject(attrs) || Object.keys(attrs).length === 0) {
      throw new SchemaDefinitionError(`${name}.attrs must be a non-empty mapping`, source);
    }

    const attributes: AttributeDefinition[] = [];
    for (const [attrName, attrDeclaration] of Object.entries(attrs)) {
      const tag = isPlainObject(attrDeclaration) ? attrDeclaration.type : undefined;
      if (!isTypeTag(tag)) {
        throw new SchemaDefinitionError(`${name}.attrs.${attrName} has unsupported type '${String(tag)}'`, source);
      }
      attributes.push({ name: attrName, tag, kind: ATTRIBUTE_TYPE_TAGS[tag] });
    }

    const { list, value, enabled, help } = raw;
    if (typeof list !== 'string' || list.length === 0 || list.endsWith('/')) {
      throw new SchemaDefinitionError(`${name}.list must be a key without a trailing slash`, source);
    }
    if (typeof value !== 'string') {
      throw new SchemaDefinitionError(`${name}.value is required`, source);
    }
    const keyAttribute = this.parseValueTemplate(name, value, list, attributes, source);

    if (enabled !== undefined && typeof enabled !== 'boolean') {
      throw new SchemaDefinitionError(`${name}.enabled must be a boolean`, source);
    }
    if (help !== undefined && typeof help !== 'string') {
      throw new SchemaDefinitionError(`${name}.help must be a string`, source);
    }

    return {
      name,
      attributes,
      keyAttribute,
      valueTemplate: value,
      listingKey: list,
      help: help ?? '',
      enabled: enabled ?? true
    };
  }

  /**
   * Check a `{list}/$Object.attr` template and return the attribute it substitutes
   */
  private parseValueTemplate(
    name: string,
    template: string,
    listingKey: string,
    attributes: AttributeDefinition[],
    source?: string
  ): string {
    const match = VALUE_TEMPLATE_PATTERN.exec(template);
    if (!match) {
      throw new SchemaDefinitionError(`${name}.value '${template}' is not of the form <list>/$${name}.<attribute>`, source);
    }
    const [, prefix, objectRef, attrName] = match;

    if (prefix !== listingKey) {
      throw new SchemaDefinitionError(`${name}.value must start with its list key '${listingKey}'`, source);
    }
    if (objectRef !== name) {
      throw new SchemaDefinitionError(`${name}.value refers to another object '${objectRef}'`, source);
    }
    const attribute = attributes.find(attr => attr.name === attrName);
    if (!attribute) {
      throw new SchemaDefinitionError(`${name}.value uses undeclared attribute '${attrName}'`, source);
    }
    if (attribute.kind !== 'string') {
      throw new SchemaDefinitionError(`${name}.value attribute '${attrName}' must be a String`, source);
    }
    return attrName;
  }
}

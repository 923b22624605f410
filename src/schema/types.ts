/**
 * Type definitions for the monitoring summary schema
 */

/**
 * Objects with typed records. A definition document may declare further objects;
 * those are registered by name and validated against their attribute set only.
 */
export const OBJECT_NAMES = ['NodeSummary', 'ClusterSummary', 'SystemSummary'] as const;

export type ObjectName = (typeof OBJECT_NAMES)[number];

export function isObjectName(value: string): value is ObjectName {
  return (OBJECT_NAMES as readonly string[]).includes(value);
}

/**
 * Attribute type tags as they appear in the definition document
 */
export const ATTRIBUTE_TYPE_TAGS = {
  String: 'string',
  int: 'int',
  Dict: 'dict',
  List: 'list'
} as const;

export type AttributeTypeTag = keyof typeof ATTRIBUTE_TYPE_TAGS;
export type AttributeKind = (typeof ATTRIBUTE_TYPE_TAGS)[AttributeTypeTag];

export interface AttributeDefinition {
  name: string;
  kind: AttributeKind;
  /** Tag exactly as written in the definition document */
  tag: AttributeTypeTag;
}

export type VersionPolicy = 'exact' | 'same-major';

/**
 * One declared summary object
 */
export interface ObjectDefinition {
  name: string;
  attributes: readonly AttributeDefinition[];
  /** Attribute whose value is the last segment of the singular key */
  keyAttribute: string;
  /** Raw singular key template, e.g. monitoring/summary/nodes/$NodeSummary.node_id */
  valueTemplate: string;
  listingKey: string;
  help: string;
  enabled: boolean;
}

/**
 * A parsed and checked definition document
 */
export interface SchemaDefinition {
  namespace: string;
  version: string;
  objects: ReadonlyMap<string, ObjectDefinition>;
  /** Source document, kept for publishing to the store */
  source: string;
}

export interface CompatibilityResult {
  compatible: boolean;
  expected: string;
  actual: string;
  policy: VersionPolicy;
  reason?: string;
}

export interface ParsedKey {
  objectName: string;
  id: string;
}

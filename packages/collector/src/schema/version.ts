/**
 * Version of the sqltrail artifact layout (`CollectorArtifact` and the
 * records it holds). Bump the major when a field is removed or changes
 * type, the minor when an optional field such as `componentType` is added.
 */

export const ARTIFACT_SCHEMA_VERSION = '1.0.0';

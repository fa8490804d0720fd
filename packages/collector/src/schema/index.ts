/**
 * Artifact schema: the version stamped into every collected artifact.
 */

export { ARTIFACT_SCHEMA_VERSION } from './version.js';

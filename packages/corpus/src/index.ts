export { ScenarioStore } from './store';
export type { ScenarioFilter } from './store';
export { parseManifest, ManifestSchema, REQUIRED_FIELDS } from './manifest';
export type { ParsedManifest, RawManifest } from './manifest';

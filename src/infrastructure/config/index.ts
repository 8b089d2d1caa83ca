export { loadAgentConfig, saveAgentConfig } from './agent-config.js';
export { ExportConfig, exportConfigSchema } from './export-config.js';
export type { ExportServiceConfig } from './export-config.js';
export { downstreamConfigs } from './downstream.js';

import type { DownstreamConfigFactories } from '../../application/index.js';
import { ExportConfig } from './export-config.js';

/** Configuration objects of the downstream services `save` may overwrite. */
export const downstreamConfigs: DownstreamConfigFactories = {
  export: () => new ExportConfig(),
};

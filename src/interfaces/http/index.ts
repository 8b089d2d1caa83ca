export { default as agentRoutes } from './agent-routes.js';
export type { AgentApi, AgentRoutesOptions } from './agent-routes.js';

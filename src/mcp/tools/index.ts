/**
 * MCP Tool Registrars barrel export
 */

export { registerIdentityTools } from './identity.js';
export { registerBrainliftTools } from './brainlifts.js';

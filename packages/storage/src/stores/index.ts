/**
 * Store Exports
 */

export { TemplateStore } from './template.js';
export { BlueprintStore } from './blueprint.js';
export { ConfigStore, GLOBAL_SCOPE } from './config.js';
export { AuditStore } from './audit.js';

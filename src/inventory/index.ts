export { FileInventorySource, InventoryError } from './inventory-source.js';
export type { InventorySource } from './inventory-source.js';
export { preDeploymentCheck, postDeploymentCheck, selectServices } from './deployment-checks.js';

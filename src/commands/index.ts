export { registerRemove } from './remove.js';
export { registerPlan } from './plan.js';
export { registerRestore } from './restore.js';
export { registerDoctor } from './doctor.js';
export { registerConfig } from './config.js';
export { registerVersion } from './version.js';

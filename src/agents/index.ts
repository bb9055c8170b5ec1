export { BaseRole, type RoleDependencies } from './BaseRole.js';
export { AuditorRole, buildFallbackPlan, type FallbackOptions } from './AuditorRole.js';
export { FixerRole } from './FixerRole.js';
export { JudgeRole } from './JudgeRole.js';
export * from './types.js';

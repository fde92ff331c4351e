/**
 * Core index - exports all core components
 */

export * from './types';
export * from './errors';
export { ALIAS_RULES, hostOf, matchAlias, resolveSource } from './SourceRouter';
export { AdmissionControl } from './AdmissionControl';
export type { AdmissionDecision, AdmissionLimits } from './AdmissionControl';
export { HandlerRegistry } from './HandlerRegistry';
export { BatchDispatcher, buildDownloadOptions, isBatchSuccessful } from './BatchDispatcher';

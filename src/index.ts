export * from './types';
export * from './utils/errors';
export * from './providers/registry';
export * from './providers/extractor';
export * from './rules/engine';
export * from './validation/transaction';
export * from './ai/prompt';
export * from './ai/response';
export * from './ai/usage';
export * from './ai/resolver';
export * from './ai/gemini';
export * from './limits/tracker';
export * from './gmail/filter';
export * from './gmail/client';
export * from './sheets/client';
export * from './pipeline/orchestrator';
export * from './db';
export { loadConfig, loadRules, createRulesTemplate, type AppConfig, type LoadConfigOptions } from './config';
export { WiseParser } from './providers/wise';
export { PayPalParser } from './providers/paypal';

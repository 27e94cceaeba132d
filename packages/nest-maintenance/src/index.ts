import 'reflect-metadata';

export * from './content/content.renderer';
export * from './content/content.source';
export * from './engine/allow-list.matcher';
export * from './engine/decision.engine';
export * from './engine/deny-uri.matcher';
export * from './engine/trigger.evaluator';
export * from './http/context';
export * from './http/maintenance.middleware';
export * from './http/response';
export * from './module/maintenance.module';
export * from './module/maintenance.tokens';
export * from './module/options';
export * from './module/runtime';
export * from './module/runtime.registry';
export * from './utils/errors';
export * from './utils/ip';
export * from './utils/logger';
export * from './utils/logger.interface';

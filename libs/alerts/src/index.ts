export * from './alert.repository';
export * from './alert.schemas';
export * from './alerts.module';
export * from './condition-evaluator';
export * from './cooldown-gate';
export * from './engine.config';
export * from './errors';
export * from './evaluation-cycle';
export * from './market-calendar';
export * from './notification-sink';
export * from './price-cache';
export * from './price-sampler';
export * from './redis-alert.repository';
export * from './session-reference.store';
export * from './slow-price.store';
export * from './types';
export * from './window-tracker';

export const EVALUATION_CYCLE = 'EVALUATION_CYCLE';
export const PRICE_SAMPLER = 'PRICE_SAMPLER';
export const EVALUATION_INTERVAL_NAME = 'alert-evaluation';
export const SAMPLING_INTERVAL_NAME = 'alert-price-sampling';

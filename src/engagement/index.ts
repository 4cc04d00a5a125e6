export * from './types';
export * from './activity-recorder';
export * from './participants';
export * from './analytics';
export * from './recommendations';
export * from './workshop-stats';

export * from './measurement.entity';
export * from './shadow-state.entity';
export * from './changelog.entity';
export * from './rate-limit-window.entity';
export * from './source-status.entity';

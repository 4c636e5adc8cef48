export * from './env.schema';
export * from './screener.config';
export * from './clock';
export * from './core.module';

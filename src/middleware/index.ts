// Export all middleware from a single file

export * from './auth';
export * from './serviceAuth';
export * from './rateLimit';
export * from './errorHandler';
export * from './validator';

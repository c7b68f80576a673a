export * from './types.js';
export * from './errors.js';

// Request governance
export * from './governance/clock.js';
export * from './governance/config.js';
export * from './governance/rolling-window-limiter.js';
export * from './governance/backoff-policy.js';
export * from './governance/request-governor.js';

// Analytics
export * from './analytics/time.js';
export * from './analytics/hashtags.js';
export * from './analytics/engagement-analyzer.js';
export * from './analytics/insight-report.js';

// Core components
export * from './graph-api-client.js';
export * from './profile-collector.js';

// Interfaces
export * from './interfaces/logger.js';
export * from './interfaces/rate-limiter.js';
export * from './interfaces/progress-reporter.js';
export * from './interfaces/profile-source.js';
export * from './interfaces/report-exporter.js';

// Adapters
export * from './adapters/report-file.js';
export * from './adapters/json-report-exporter.js';
export * from './adapters/markdown-report-exporter.js';

export * from './utils/logger.js';

export * from './watch/types';
export * from './watch/errors';
export { systemClock, ManualClock, type Clock } from './watch/clock';
export * from './watch/extract';
export * from './watch/resolve';
export * from './watch/template';
export * from './watch/simulator';
export * from './watch/batch';
export * from './watch/courses';
export { MoodleClient, createMoodleClient, DEFAULT_HEADERS, type ClientOptions } from './watch/api';
export { assertAllowedRequest, SERVICE_PATH } from './watch/safety';
export { getDefaultConfig, getPaths, cookieHeaderFrom } from './watch/config';
export * from './watch/io';
export * from './watch/run';

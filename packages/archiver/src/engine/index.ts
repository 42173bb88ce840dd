export { ProcessEngine, buildEngineArgs, parseEventLine } from './ProcessEngine';
export type { DownloadEngine, EngineFactory } from './types';

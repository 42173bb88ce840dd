export { ArchiveJob, compareJobs, compareSortKeys, describeFormat } from './ArchiveJob';
export { HealthScheduler, type HealthSchedulerOptions } from './HealthScheduler';
export { JobRegistry, generateJobId, type JobRegistryOptions, type JobRequest } from './JobRegistry';
export { createManifestProgress, currentSeq, estimateTimeRemaining } from './progress';
export * from './types';

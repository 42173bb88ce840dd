import { ManifestProgress } from '@streamvault/shared';

export function createManifestProgress(): ManifestProgress {
  return {
    videoSeq: 0,
    audioSeq: 0,
    maxSeq: 0,
    totalDownloaded: 0,
    fragmentDuration: null,
    output: { outTime: 0, totalSize: null },
    startSeq: 0,
    firstUpdate: null,
    lastUpdate: null
  };
}

export function currentSeq(progress: ManifestProgress): number {
  return Math.max(progress.videoSeq, progress.audioSeq);
}

/**
 * Seconds left until every known fragment is delivered, extrapolated from the
 * rate observed since the first update. Null until a rate can be measured.
 */
export function estimateTimeRemaining(progress: ManifestProgress): number | null {
  if (!progress.firstUpdate || !progress.lastUpdate) {
    return null;
  }
  const elapsedSeconds = (progress.lastUpdate.getTime() - progress.firstUpdate.getTime()) / 1000;
  const delivered = currentSeq(progress) - progress.startSeq;
  if (elapsedSeconds <= 0 || delivered <= 0) {
    return null;
  }
  const remaining = Math.max(0, progress.maxSeq - currentSeq(progress));
  return remaining / (delivered / elapsedSeconds);
}

export {
  FeedMonitor,
  channelFeedUrl,
  displayAuthor,
  matchEntries,
  slidingWindow,
  uniqueDescriptionLines,
  type FeedEntry,
  type FeedItemMatch,
  type FeedMonitorOptions
} from './FeedMonitor';
export {
  IngestionDaemon,
  isArchivable,
  type ChannelMatchSource,
  type IngestionDaemonOptions,
  type ScheduleOutcome
} from './IngestionDaemon';
export { compressSpacedLetters, getPatternMatches, normalizedVariants, stripMarks } from './patterns';

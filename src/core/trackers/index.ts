export {
  TrackerCache,
  localDateStamp,
  mergeTrackers,
  parseTrackerList,
  type TrackerCacheOptions,
} from './cache.js';

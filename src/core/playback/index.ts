export { systemClock, type Clock } from './clock.js';
export { MpvPlayer, type PlayerLauncher, type PlayerProcess } from './player.js';
export {
  BUFFER_FILE_BASENAME,
  DownloadPlaybackController,
  filePriorities,
  type DownloadJob,
  type PlaybackControllerOptions,
  type PlayOptions,
} from './controller.js';

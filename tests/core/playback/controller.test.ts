import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as path from 'path';
import {
  DownloadPlaybackController,
  filePriorities,
  type DownloadJob,
  type PlaybackControllerOptions,
} from '../../../src/core/playback/controller.js';
import {
  CancelledError,
  EngineError,
  FileNotFoundError,
  FilePriority,
  PlaybackBusyError,
  PlaybackState,
  type Stream,
} from '../../../src/core/types.js';
import {
  FakeClock,
  FakeEngine,
  FakeHandle,
  FakePlayer,
  file,
  status,
  TEST_HASH,
  testStream,
} from '../../helpers/fakes.js';
import { makeTempDir, removeTempDir } from '../../helpers/tempdir.js';

const THRESHOLD = 100;

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

describe('filePriorities', () => {
  it('should want only the selected file', () => {
    expect(filePriorities(2, 1)).toEqual([FilePriority.SKIP, FilePriority.WANTED]);
    expect(filePriorities(3, 0)).toEqual([FilePriority.WANTED, FilePriority.SKIP, FilePriority.SKIP]);
  });

  it('should return an empty list for a transfer without files', () => {
    expect(filePriorities(0, 0)).toEqual([]);
  });
});

describe('DownloadPlaybackController', () => {
  let baseDir: string;
  let clock: FakeClock;
  let player: FakePlayer;
  let handle: FakeHandle;
  let engine: FakeEngine;

  beforeEach(async () => {
    baseDir = await makeTempDir();
    clock = new FakeClock();
    player = new FakePlayer();
    handle = new FakeHandle(
      TEST_HASH,
      [file(0, 'sample.txt'), file(1, 'movie.mkv')],
      [status(0, false), status(0), status(40), status(THRESHOLD)]
    );
    engine = new FakeEngine(() => handle);
  });

  afterEach(async () => {
    await removeTempDir(baseDir);
  });

  function controller(overrides: Partial<PlaybackControllerOptions> = {}) {
    return new DownloadPlaybackController({
      engine,
      player,
      baseDir,
      bootstrapTrackers: ['udp://bootstrap.test/announce', 'udp://stream.test/announce'],
      bufferThreshold: THRESHOLD,
      pollInterval: 250,
      clock,
      ...overrides,
    });
  }

  describe('play', () => {
    it('should walk every state and complete with the player exit code', async () => {
      const playback = controller();
      const states: PlaybackState[] = [];
      playback.on('state', ({ state }) => states.push(state));

      const outcome = await playback.play(testStream());

      expect(outcome).toEqual({ status: 'completed', exitCode: 0, downloadedBytes: THRESHOLD });
      expect(states).toEqual([
        PlaybackState.REGISTERING,
        PlaybackState.RESOLVING_METADATA,
        PlaybackState.SELECTING_FILE,
        PlaybackState.BUFFERING,
        PlaybackState.PLAYING,
        PlaybackState.CLEANUP,
        PlaybackState.FINISHED,
      ]);
      expect(playback.state).toBe(PlaybackState.FINISHED);
      expect(playback.activeJob).toBeNull();
      expect(clock.sleeps).toEqual([250, 250]);
    });

    it('should register the transfer in upload mode with merged trackers', async () => {
      await controller().play(testStream());

      expect(engine.descriptors).toEqual([
        {
          magnetLink: `magnet:?xt=urn:btih:${TEST_HASH}`,
          infoHash: TEST_HASH,
          trackers: ['udp://bootstrap.test/announce', 'udp://stream.test/announce'],
          savePath: baseDir,
          sequential: true,
          uploadMode: true,
        },
      ]);
    });

    it('should want only the file named by the stream and play it from the buffer path', async () => {
      const selected: string[] = [];
      const playback = controller();
      playback.on('file:selected', ({ filename }) => selected.push(filename));

      await playback.play(testStream());

      const bufferPath = path.join(baseDir, 'stream_buffer.mkv');
      expect(handle.priorities).toEqual([[FilePriority.SKIP, FilePriority.WANTED]]);
      expect(handle.relocations).toEqual([{ index: 1, targetPath: bufferPath }]);
      expect(handle.released).toBe(true);
      expect(selected).toEqual(['movie.mkv']);
      expect(player.launched).toEqual([bufferPath]);
    });

    it('should remove a stale buffer file before relocating the selected file', async () => {
      const bufferPath = path.join(baseDir, 'stream_buffer.mkv');
      await fs.writeFile(bufferPath, 'left over from an earlier run');

      await controller().play(testStream());

      expect(handle.relocations).toEqual([{ index: 1, targetPath: bufferPath }]);
      expect(handle.targetsExisted).toEqual([false]);
    });

    it('should start the player once downloaded bytes equal the threshold', async () => {
      const progress: number[] = [];
      const playback = controller();
      playback.on('buffer:progress', ({ bufferedBytes }) => progress.push(bufferedBytes));

      await playback.play(testStream());

      expect(progress).toEqual([40, THRESHOLD]);
    });

    it('should remove the transfer and the buffer file after the player exits', async () => {
      const cleaned: string[] = [];
      const playback = controller();
      playback.on('cleanup', ({ infoHash }) => cleaned.push(infoHash));

      await playback.play(testStream());

      expect(engine.removed).toEqual([{ infoHash: TEST_HASH, options: { deleteData: true } }]);
      expect(await exists(path.join(baseDir, 'stream_buffer.mkv'))).toBe(false);
      expect(cleaned).toEqual([TEST_HASH]);
    });

    it('should keep downloaded data when configured to', async () => {
      await controller({ deleteDataOnCleanup: false }).play(testStream());

      expect(engine.removed[0]?.options).toEqual({ deleteData: false });
    });

    it('should fail with FileNotFoundError when the file is not in the transfer', async () => {
      const playback = controller();
      const errors: Error[] = [];
      playback.on('error', ({ error }) => errors.push(error));

      await expect(playback.play(testStream({ filenameHint: 'other.mkv' }))).rejects.toBeInstanceOf(
        FileNotFoundError
      );

      expect(handle.priorities).toEqual([]);
      expect(player.launched).toEqual([]);
      expect(engine.removed).toHaveLength(1);
      expect(playback.state).toBe(PlaybackState.FAILED);
      expect(errors.map((e) => e.name)).toEqual(['FileNotFoundError']);
    });

    it('should surface engine failures while polling and still clean up', async () => {
      handle.failure = new EngineError('tracker exploded');

      await expect(controller().play(testStream())).rejects.toThrow('tracker exploded');

      expect(engine.removed).toHaveLength(1);
    });

    it('should wrap a non-engine error from addTransfer', async () => {
      engine.addError = new Error('duplicate');

      await expect(controller().play(testStream())).rejects.toThrow(
        `Engine rejected ${TEST_HASH}: duplicate`
      );
      expect(engine.removed).toEqual([]);
    });

    it('should reject a second playback while one is active', async () => {
      player.holdOpen = true;
      const playback = controller();

      const first = playback.play(testStream());
      await new Promise<void>((resolve) => {
        playback.once('player:started', () => resolve());
      });

      await expect(playback.play(testStream())).rejects.toBeInstanceOf(PlaybackBusyError);

      player.processes[0]?.exit(0);
      await expect(first).resolves.toMatchObject({ status: 'completed' });
      expect(engine.descriptors).toHaveLength(1);
    });

    it('should report a null exit code when the player was killed by a signal', async () => {
      player.exitCode = null;

      const outcome = await controller().play(testStream());

      expect(outcome.exitCode).toBeNull();
    });
  });

  describe('cancellation', () => {
    it('should not register anything for an already aborted signal', async () => {
      const abort = new AbortController();
      abort.abort();

      await expect(controller().play(testStream(), { signal: abort.signal })).rejects.toBeInstanceOf(
        CancelledError
      );
      expect(engine.descriptors).toEqual([]);
    });

    it('should clean up when cancelled while waiting for metadata', async () => {
      handle = new FakeHandle(
        TEST_HASH,
        [file(0, 'sample.txt'), file(1, 'movie.mkv')],
        [
          { ...status(0, false), numPeers: 1 },
          { ...status(0, false), numPeers: 2 },
          { ...status(0, false), numPeers: 4 },
        ]
      );
      const abort = new AbortController();
      const playback = controller();
      const peers: number[] = [];
      const states: PlaybackState[] = [];
      playback.on('metadata:progress', (event) => peers.push(event.peers));
      playback.on('state', ({ state }) => states.push(state));
      clock.onSleep = () => {
        if (clock.sleeps.length === 3) {
          abort.abort();
        }
      };

      await expect(playback.play(testStream(), { signal: abort.signal })).rejects.toBeInstanceOf(
        CancelledError
      );

      expect(peers).toEqual([1, 2, 4]);
      expect(engine.removed).toHaveLength(1);
      expect(handle.priorities).toEqual([]);
      expect(handle.relocations).toEqual([]);
      expect(handle.released).toBe(false);
      expect(states).toEqual([
        PlaybackState.REGISTERING,
        PlaybackState.RESOLVING_METADATA,
        PlaybackState.CLEANUP,
        PlaybackState.FAILED,
      ]);
    });

    it('should clean up when cancelled while buffering', async () => {
      const abort = new AbortController();
      const playback = controller();
      playback.on('buffer:progress', () => {
        clock.onSleep = () => abort.abort();
      });

      await expect(playback.play(testStream(), { signal: abort.signal })).rejects.toBeInstanceOf(
        CancelledError
      );

      expect(player.launched).toEqual([]);
      expect(engine.removed).toHaveLength(1);
      expect(await exists(path.join(baseDir, 'stream_buffer.mkv'))).toBe(false);
      expect(playback.state).toBe(PlaybackState.FAILED);
    });

    it('should kill the player when cancelled while playing', async () => {
      player.holdOpen = true;
      const abort = new AbortController();
      const playback = controller();
      playback.on('player:started', () => abort.abort());

      await expect(playback.play(testStream(), { signal: abort.signal })).rejects.toBeInstanceOf(
        CancelledError
      );

      expect(player.processes[0]?.killed).toBe(true);
      expect(engine.removed).toHaveLength(1);
    });
  });

  describe('cancel and settled', () => {
    it('should settle straight away when nothing is playing', async () => {
      const playback = controller();

      playback.cancel();

      await expect(playback.settled()).resolves.toBeUndefined();
      expect(engine.descriptors).toEqual([]);
    });

    it('should settle only after the cancelled playback has cleaned up', async () => {
      player.holdOpen = true;
      engine.removeDelay = 20;
      const playback = controller();
      const started = new Promise<void>((resolve) => {
        playback.once('player:started', () => resolve());
      });
      const failure = playback.play(testStream()).catch((err: unknown) => err);
      await started;

      playback.cancel();
      await playback.settled();

      expect(engine.calls).toEqual(['removeTransfer:start', 'removeTransfer:end']);
      expect(await exists(path.join(baseDir, 'stream_buffer.mkv'))).toBe(false);
      expect(player.processes[0]?.killed).toBe(true);
      expect(playback.activeJob).toBeNull();
      expect(await failure).toBeInstanceOf(CancelledError);
    });
  });

  describe('cleanup', () => {
    function job(stream: Stream = testStream()): DownloadJob {
      return {
        stream,
        handle,
        selectedFileIndex: 1,
        bufferedBytes: 0,
        bufferPath: path.join(baseDir, 'stream_buffer.mkv'),
        state: PlaybackState.PLAYING,
        cleanedUp: false,
      };
    }

    it('should only do work on the first call', async () => {
      const playback = controller();
      const target = job();

      await playback.cleanup(target);
      await playback.cleanup(target);

      expect(engine.removed).toHaveLength(1);
      expect(target.cleanedUp).toBe(true);
    });

    it('should tolerate a missing buffer file', async () => {
      await expect(controller().cleanup(job())).resolves.toBeUndefined();
    });

    it('should remove the buffer even when removing the transfer fails', async () => {
      engine.removeError = new EngineError('remove failed');
      const target = job();
      await fs.writeFile(target.bufferPath ?? '', 'data');

      await expect(controller().cleanup(target)).rejects.toThrow('remove failed');

      expect(await exists(path.join(baseDir, 'stream_buffer.mkv'))).toBe(false);
    });

    it('should wrap foreign cleanup failures in an EngineError', async () => {
      engine.removeError = new Error('socket closed');

      await expect(controller().cleanup(job())).rejects.toThrow('Cleanup failed: socket closed');
    });

    it('should fail a completed playback whose cleanup fails', async () => {
      engine.removeError = new EngineError('remove failed');
      const playback = controller();

      await expect(playback.play(testStream())).rejects.toBeInstanceOf(EngineError);

      expect(engine.removed).toHaveLength(1);
      expect(playback.state).toBe(PlaybackState.FAILED);
    });
  });
});

import { promises as fs } from 'fs';
import type { Clock, PlayerLauncher, PlayerProcess } from '../../src/core/playback/index.js';
import type {
  EngineOpenOptions,
  RemoveTransferOptions,
  TorrentEngine,
  TransferDescriptor,
  TransferFile,
  TransferHandle,
  TransferStatus,
} from '../../src/core/torrent/index.js';
import { CancelledError, type FilePriority, type Stream } from '../../src/core/types.js';

export const TEST_HASH = '0123456789abcdef0123456789abcdef01234567';

export function testStream(overrides: Partial<Stream> = {}): Stream {
  return {
    title: 'Movie 1080p',
    infoHash: TEST_HASH,
    sources: ['udp://stream.test/announce'],
    filenameHint: 'movie.mkv',
    provider: 'https://provider.test',
    ...overrides,
  };
}

export function status(totalDownload: number, hasMetadata = true): TransferStatus {
  return { hasMetadata, numPeers: 3, totalDownload, downloadSpeed: 1024 };
}

// =============================================================================
// Clock
// =============================================================================

/**
 * Clock that returns immediately; onSleep runs before each wait resolves.
 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];
  onSleep: (() => void) | null = null;

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    this.sleeps.push(ms);
    this.onSleep?.();
    if (signal?.aborted) {
      throw new CancelledError();
    }
  }
}

// =============================================================================
// Torrent Engine
// =============================================================================

/**
 * Transfer answering status polls from a script; the last entry repeats.
 */
export class FakeHandle implements TransferHandle {
  readonly infoHash: string;
  readonly priorities: FilePriority[][] = [];
  readonly relocations: Array<{ index: number; targetPath: string }> = [];

  /** Whether each relocation target already existed when it was moved to */
  readonly targetsExisted: boolean[] = [];
  released = false;
  failure: Error | null = null;

  private readonly fileList: TransferFile[];
  private readonly statuses: TransferStatus[];

  constructor(infoHash: string, files: TransferFile[], statuses: TransferStatus[]) {
    this.infoHash = infoHash;
    this.fileList = files;
    this.statuses = [...statuses];
  }

  status(): TransferStatus {
    if (this.failure) {
      throw this.failure;
    }
    const next = this.statuses.length > 1 ? this.statuses.shift() : this.statuses[0];
    return next ?? status(0, false);
  }

  files(): TransferFile[] {
    return this.fileList;
  }

  prioritizeFiles(priorities: readonly FilePriority[]): void {
    this.priorities.push([...priorities]);
  }

  async relocateFile(index: number, targetPath: string): Promise<void> {
    this.relocations.push({ index, targetPath });
    this.targetsExisted.push(await fs.access(targetPath).then(() => true, () => false));
    await fs.writeFile(targetPath, 'buffered data');
  }

  releaseUploadMode(): void {
    this.released = true;
  }
}

export function file(index: number, name: string, size = 1000): TransferFile {
  return { index, name, path: `Release/${name}`, size };
}

export class FakeEngine implements TorrentEngine {
  readonly opened: EngineOpenOptions[] = [];
  readonly descriptors: TransferDescriptor[] = [];
  readonly removed: Array<{ infoHash: string; options: RemoveTransferOptions }> = [];
  closeCount = 0;
  addError: Error | null = null;
  removeError: Error | null = null;
  closeError: Error | null = null;
  savedState = Buffer.from('engine-state');
  lastHandle: FakeHandle | null = null;

  /** Milliseconds removeTransfer takes to finish */
  removeDelay = 0;

  /** Order of removeTransfer and close calls */
  readonly calls: string[] = [];

  private readonly nextHandle: (descriptor: TransferDescriptor) => FakeHandle;

  constructor(nextHandle?: (descriptor: TransferDescriptor) => FakeHandle) {
    this.nextHandle =
      nextHandle ?? ((d) => new FakeHandle(d.infoHash, [file(0, 'movie.mkv')], [status(0)]));
  }

  async open(options: EngineOpenOptions): Promise<void> {
    this.opened.push(options);
  }

  async addTransfer(descriptor: TransferDescriptor): Promise<TransferHandle> {
    this.descriptors.push(descriptor);
    if (this.addError) {
      throw this.addError;
    }
    this.lastHandle = this.nextHandle(descriptor);
    return this.lastHandle;
  }

  async removeTransfer(handle: TransferHandle, options: RemoveTransferOptions): Promise<void> {
    this.removed.push({ infoHash: handle.infoHash, options });
    this.calls.push('removeTransfer:start');
    if (this.removeDelay > 0) {
      await new Promise<void>((resolve) => setTimeout(resolve, this.removeDelay));
    }
    this.calls.push('removeTransfer:end');
    if (this.removeError) {
      throw this.removeError;
    }
  }

  saveState(): Buffer {
    return this.savedState;
  }

  async close(): Promise<void> {
    this.closeCount++;
    this.calls.push('engine:close');
    if (this.closeError) {
      throw this.closeError;
    }
  }
}

// =============================================================================
// Player
// =============================================================================

export class FakePlayerProcess implements PlayerProcess {
  killed = false;
  private readonly exited: Promise<number | null>;
  private finish: (code: number | null) => void = () => undefined;

  constructor() {
    this.exited = new Promise<number | null>((resolve) => {
      this.finish = resolve;
    });
  }

  wait(): Promise<number | null> {
    return this.exited;
  }

  kill(): void {
    this.killed = true;
    this.finish(null);
  }

  exit(code: number | null): void {
    this.finish(code);
  }
}

/**
 * Player that exits with exitCode straight away unless holdOpen is set.
 */
export class FakePlayer implements PlayerLauncher {
  readonly launched: string[] = [];
  readonly processes: FakePlayerProcess[] = [];
  exitCode: number | null = 0;
  holdOpen = false;

  launch(filePath: string): PlayerProcess {
    this.launched.push(filePath);
    const process = new FakePlayerProcess();
    this.processes.push(process);
    if (!this.holdOpen) {
      process.exit(this.exitCode);
    }
    return process;
  }
}

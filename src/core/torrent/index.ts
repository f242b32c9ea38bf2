export type {
  EngineOpenOptions,
  RemoveTransferOptions,
  TorrentEngine,
  TransferDescriptor,
  TransferFile,
  TransferHandle,
  TransferStatus,
} from './engine.js';
export { parseMagnetInfoHash } from './magnet.js';
export { WebTorrentEngine, decodeSessionState, encodeSessionState } from './webtorrent.js';

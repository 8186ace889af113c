/**
 * @relayarr/acquisition
 * 
 * Everything that touches download hosts or the download engine:
 * - Link Verifier (host liveness probes)
 * - JDownloader client over the MyJDownloader relay
 * - Download Bridge implementation for JDownloader
 */

export {
  LinkVerifier,
  HttpLinkProbe,
  liveOnly,
  verdictForStatus,
  type LinkProbe,
  type LinkVerifierOptions,
} from './verifier.js';

export {
  JDownloaderClient,
  JdApiError,
  type JDownloaderConfig,
  type JdEngineClient,
  type JdPackage,
  type PackageList,
  type AddLinksOptions,
} from './clients/jdownloader.js';

export {
  JDownloaderBridge,
  packageNameFor,
  type JDownloaderBridgeOptions,
} from './bridge/jdownloaderBridge.js';

export {
  normalizePackageName,
  classifyPackage,
  type ClassifiedPackage,
} from './bridge/normalize.js';

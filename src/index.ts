export * from './types/config.js';
export * from './types/checksum.js';
export * from './types/diagnostic.js';
export * from './types/document.js';
export * from './types/enums.js';
export * from './types/fs.js';
export * from './types/ids.js';
export * from './types/metadata.js';
export * from './types/model.js';
export * from './types/plan.js';
export * from './types/scan.js';
export * from './errors.js';
export { createLogger, silentLogger } from './logger.js';
export { loadConfig, resolveConfig, parseEnv } from './config/loadConfig.js';
export type { ConfigOverrides, EnvSource, LoadConfigOptions } from './config/loadConfig.js';
export { DiagnosticLog } from './diagnostics/DiagnosticLog.js';
export { IndexDocumentParser } from './document/IndexDocumentParser.js';
export { FilesystemCorrelator } from './scanner/FilesystemCorrelator.js';
export { NodeFileSystem } from './scanner/NodeFileSystem.js';
export { MemoryFileSystem } from './scanner/MemoryFileSystem.js';
export { ChecksumCache } from './checksum/ChecksumCache.js';
export { hashModel } from './checksum/hashModel.js';
export { MetadataResolver } from './resolve/MetadataResolver.js';
export { MentionIndex } from './resolve/MentionIndex.js';
export { IdentifierClusters } from './resolve/IdentifierClusters.js';
export { IncrementalPlanner } from './plan/IncrementalPlanner.js';
export { BuildMarker } from './plan/BuildMarker.js';
export { PageLinkStore, collectPageLinks } from './plan/PageLinks.js';
export type { PageLinks, PageLinkMap } from './plan/PageLinks.js';
export { Renderer } from './render/Renderer.js';
export { TemplateSet } from './render/TemplateSet.js';
export { OutputWriter } from './render/OutputWriter.js';
export { BuildCoordinator, EXIT_CODES } from './build/BuildCoordinator.js';
export type { BuildResult, BuildStatus, BuildCoordinatorOptions } from './build/BuildCoordinator.js';
export { BuildLock } from './build/BuildLock.js';
export { Notifier } from './notify/Notifier.js';
export { expandUncacheUrls } from './notify/uncache.js';
export { runCli } from './cli/program.js';

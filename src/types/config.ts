export interface OutputModes {
  file: number;
  dir: number;
}

export interface SearchNotifyConfig {
  url: string;
  key: string;
}

export interface PurgeNotifyConfig {
  url: string;
  key: string;
  email: string;
  prefixes: string[];
  unboxBase?: string;
}

export interface ReservedRules {
  glob: string[];
  regex: string[];
}

/** Every option a build reads, resolved once and threaded through the pipeline. */
export interface BuildConfig {
  rootName: string;
  indexPath: string;
  treeDir: string;
  destDir: string;
  templateDir?: string;
  cachePath: string;
  markerPath: string;
  /** Link graph of the last successful build. */
  linksPath: string;
  lockPath: string;
  manifestName: string;
  fragmentName: string;
  identifierKeys: string[];
  reserved: ReservedRules;
  quietPrefixes: string[];
  excludeUndocumented: boolean;
  forceFull: boolean;
  triggerSearchIndex: boolean;
  feedSize: number;
  feedTitle: string;
  siteUrl: string;
  pageBaseUrl: string;
  fileBaseUrl: string;
  hashConcurrency: number;
  outputModes: OutputModes;
  search?: SearchNotifyConfig;
  purge?: PurgeNotifyConfig;
  logLevel: string;
}

export interface PluginRecord {
  /** Unique key; also the working directory name under the plugins root. */
  name: string;
  /** Remote identifier such as `owner/repo`, a full URL, or a local path. */
  sourceRepo: string;
  /** Tag requested by the user. */
  pin?: string;
  /** Tag actually checked out, when tag resolution succeeded. */
  resolvedTag?: string;
  /** Local HEAD after the last successful operation. */
  commitHash: string;
  /** ISO-8601 UTC timestamp of the last successful install or upgrade. */
  lastSyncedAt: string;
  enabled: boolean;
  skipAutoUpdate: boolean;
  /** Paths relative to the working directory, sourced in this order. */
  sourceScripts: string[];
}

export type Registry = Map<string, PluginRecord>;

export interface RegistryDocument {
  plugins: PluginRecord[];
}

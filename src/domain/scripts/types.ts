export interface ScriptRunner {
  /** Execute one plugin script. Throws when the script could not be run. */
  run(scriptPath: string): Promise<void>;
}

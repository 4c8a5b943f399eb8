/**
 * Layout types
 */

/**
 * Absolute paths of everything dotstrap manages under the prefix.
 */
export interface InstallLayout {
  prefix: string;
  bin: string;
  lib: string;
  configDir: string;
  toolsConf: string;
  settingsFile: string;
  shareDir: string;
  cacheDir: string;
  toolchainsDir: string;
}

export interface EnsureDirOptions {
  /** Octal mode string for chmod */
  mode?: string;
  /** Group for `chown root:<group>`; ownership is left alone when omitted */
  group?: string;
}

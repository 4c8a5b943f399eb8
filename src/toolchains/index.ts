/**
 * Toolchains module
 *
 * conda, Rust, Go, Zig, Perl and Ruby under <prefix>/share/dev/toolchains.
 */

export type { Toolchain, ToolchainOptions, ToolchainResult, ToolchainState } from "./toolchains.types";

export { TOOLCHAINS, installToolchain, runToolchains } from "./toolchains";
export { latestGoVersion, goArchiveUrl } from "./go";
export { selectZigRelease, zigFallbackUrl, type ZigRelease } from "./zig";
export { parsePerlVersion } from "./perl";
export { minicondaInstallerUrl } from "./conda";
export { RUBY_PACKAGES } from "./ruby";
export { probeVersion, linkBinaries, fetchText, fetchJson } from "./shared";

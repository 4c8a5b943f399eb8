/**
 * Global constants for dotstrap
 */

export const APP_NAME = "dotstrap";
export const USER_AGENT = "dotstrap";

// Prefix candidates, in order of preference
export const PREFERRED_PREFIX = "/opt/local";
export const FALLBACK_PREFIX = "/usr/local";

// Directory layout relative to the prefix
export const CONFIG_SUBDIR = "etc/dev";
export const SHARE_SUBDIR = "share/dev";
export const CACHE_SUBDIR = "share/dev/cache";
export const TOOLCHAINS_SUBDIR = "share/dev/toolchains";
export const TOOLS_CONF_FILE = "tools.conf";
export const SETTINGS_FILE = "settings.yaml";

export const DIRECTORY_MODE = "775";
export const BINARY_MODE = "755";
export const CONFIG_FILE_MODE = "664";

export const VERSION_TYPES = ["stable", "head", "managed", "none"] as const;
export const DEFAULT_VERSION_TYPE = "stable";

export const TOOLCHAIN_NAMES = ["conda", "rust", "go", "zig", "perl", "ruby"] as const;

// Ref in each cache repository recording the commit last installed from it
export const INSTALLED_REF = "refs/dotstrap/installed";

// Matches plain release tags such as 1.2.3 or v0.24.0
export const DEFAULT_TAG_PATTERN = /^v?\d+(\.\d+)*$/;
export const DEFAULT_BRANCHES = ["master", "main"];

// Extracts the first dotted version from `--version` output
export const VERSION_IN_OUTPUT_REGEX = /\d+(?:\.\d+)+[a-z]?/;

// tools.conf line: name=value
export const TOOL_NAME_REGEX = /^[A-Za-z0-9_-]+$/;

export const GO_RELEASES_URL = "https://go.dev/dl/?mode=json";
export const GO_DOWNLOAD_BASE = "https://go.dev/dl";
export const GO_FALLBACK_VERSION = "1.21.1";

export const ZIG_INDEX_URL = "https://ziglang.org/download/index.json";
export const ZIG_DOWNLOAD_BASE = "https://ziglang.org/download";
export const ZIG_FALLBACK_VERSION = "0.11.0";

export const PERL_DOWNLOAD_PAGE = "https://www.perl.org/get.html";
export const PERL_SOURCE_BASE = "https://www.cpan.org/src/5.0";
export const PERL_FALLBACK_VERSION = "5.38.0";

export const MINICONDA_BASE = "https://repo.anaconda.com/miniconda";
export const RUSTUP_INIT_URL = "https://sh.rustup.rs";

export const GITHUB_API_URL = "https://api.github.com";
export const GITHUB_URL = "https://github.com";

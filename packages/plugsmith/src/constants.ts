export const EXTENSIONS_FILENAME = "extensions.toml"
export const INSTALLED_STATE_FILENAME = ".extensions.lock"
export const DEFAULT_HOSTED_BASE_URL = "https://github.com"

export const PLUGIN_DEPENDENCY_MANIFEST = "Gemfile"
export const PLUGIN_MIGRATIONS_DIR = ["db", "migrate"] as const

export const PLUGSMITH_VERSION = "0.1.0"

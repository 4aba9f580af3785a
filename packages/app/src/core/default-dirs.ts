// CHANGE: list the default search roots for uv-managed venvs per platform
// WHY: tool-owned locations are scanned before generic project folders
// FORMAT THEOREM: ∀env: order(candidates(env)) = toolDirs ++ projectDirs
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: tool dirs precede project dirs
// COMPLEXITY: O(1)/O(1)

export interface SearchRootEnv {
  readonly home: string
  readonly platform: string
  readonly localAppData: string | undefined
  readonly join: (...segments: ReadonlyArray<string>) => string
}

export interface SearchRootCandidates {
  readonly toolDirs: ReadonlyArray<string>
  readonly projectDirs: ReadonlyArray<string>
  readonly supportedPlatform: boolean
}

const projectFolderNames = ["projects", "dev", "code", "workspace"] as const

const toolDirsFor = (env: SearchRootEnv): ReadonlyArray<string> | undefined => {
  const legacy = env.join(env.home, ".uv", "venvs")
  const shared = env.join(env.home, ".local", "share", "uv", "venvs")
  switch (env.platform) {
    case "darwin":
      return [legacy, shared, env.join(env.home, "Library", "Caches", "uv", "venvs")]
    case "linux":
      return [legacy, shared, env.join(env.home, ".cache", "uv", "venvs")]
    case "win32":
      return env.localAppData === undefined || env.localAppData.length === 0
        ? [legacy]
        : [legacy, env.join(env.localAppData, "uv", "venvs")]
    default:
      return undefined
  }
}

/**
 * Build the ordered list of places uv venvs usually live.
 *
 * @param env - Home directory, platform id, LOCALAPPDATA, and a path joiner.
 * @returns Tool dirs and project dirs, before any existence check.
 *
 * @pure true
 * @invariant unsupported platforms fall back to ~/.uv/venvs
 * @complexity O(1)
 */
export const defaultSearchRoots = (env: SearchRootEnv): SearchRootCandidates => {
  const toolDirs = toolDirsFor(env)
  return {
    toolDirs: toolDirs ?? [env.join(env.home, ".uv", "venvs")],
    projectDirs: projectFolderNames.map((name) => env.join(env.home, name)),
    supportedPlatform: toolDirs !== undefined
  }
}

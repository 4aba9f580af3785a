// CHANGE: centralize platform-specific venv layout names in one profile
// WHY: probes must not branch on the OS inline
// FORMAT THEOREM: ∀p: profileForPlatform(p) ∈ {posixProfile, windowsProfile}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: structureDirs has exactly three entries
// COMPLEXITY: O(1)/O(1)

export interface PlatformProfile {
  readonly scriptsDir: string
  readonly libDir: string
  readonly includeDir: string
  readonly interpreter: string
  readonly activationScripts: ReadonlyArray<string>
  readonly installerBinaries: ReadonlyArray<string>
}

export const posixProfile: PlatformProfile = {
  scriptsDir: "bin",
  libDir: "lib",
  includeDir: "include",
  interpreter: "python",
  activationScripts: ["activate", "activate.fish", "activate.csh"],
  installerBinaries: ["pip", "pip3"]
}

export const windowsProfile: PlatformProfile = {
  scriptsDir: "Scripts",
  libDir: "Lib",
  includeDir: "Include",
  interpreter: "python.exe",
  activationScripts: ["activate.bat", "activate.ps1"],
  installerBinaries: ["pip.exe", "pip3.exe", "pip-script.py"]
}

/** Markers left by uv itself; identical on every platform. */
export const toolMarkers = {
  venvConfigFile: "pyvenv.cfg",
  configMarker: "uv",
  markerFile: ".uv-proj",
  cacheDir: [".uv", "venvs"],
  projectMarkers: [".project", ".vscode", ".idea"]
} as const

export const structureDirs = (profile: PlatformProfile): ReadonlyArray<string> => [
  profile.scriptsDir,
  profile.libDir,
  profile.includeDir
]

/**
 * Select the layout profile for a Node.js platform identifier.
 *
 * @param platform - Value of `process.platform`.
 * @returns Windows profile for win32, POSIX profile otherwise.
 *
 * @pure true
 * @complexity O(1)
 */
export const profileForPlatform = (platform: string): PlatformProfile =>
  platform === "win32" ? windowsProfile : posixProfile

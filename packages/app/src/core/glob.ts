// CHANGE: shell-style glob matching for excluding discovered venv paths
// WHY: --exclude takes patterns like "*/work/*" matched against whole paths
// FORMAT THEOREM: ∀p,g: filterPaths(ps, gs) = {p ∈ ps | ¬∃g: match(g, p)}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: '*' matches any run of characters, path separators included
// COMPLEXITY: O(n) per match

const escapeRegex = (value: string): string => value.replaceAll(/[.*+?^${}()|[\]\\]/gu, String.raw`\$&`)

// Returns the regex class and the index after ']', or undefined when unterminated.
const readClass = (
  pattern: string,
  start: number
): { readonly source: string; readonly next: number } | undefined => {
  let index = start + 1
  if (pattern.charAt(index) === "!") {
    index += 1
  }
  if (pattern.charAt(index) === "]") {
    index += 1
  }
  while (index < pattern.length && pattern.charAt(index) !== "]") {
    index += 1
  }
  if (index >= pattern.length) {
    return undefined
  }
  const body = pattern.slice(start + 1, index)
  const negated = body.startsWith("!")
  const members = (negated ? body.slice(1) : body).replaceAll("\\", "\\\\").replaceAll("]", "\\]")
  if (negated) {
    return { source: `[^${members}]`, next: index + 1 }
  }
  return { source: members.startsWith("^") ? `[\\${members}]` : `[${members}]`, next: index + 1 }
}

const globToRegex = (pattern: string): RegExp => {
  let regex = "^"
  let index = 0
  while (index < pattern.length) {
    const char = pattern.charAt(index)
    if (char === "*") {
      regex += ".*"
      index += 1
      continue
    }
    if (char === "?") {
      regex += "."
      index += 1
      continue
    }
    if (char === "[") {
      const charClass = readClass(pattern, index)
      if (charClass !== undefined) {
        regex += charClass.source
        index = charClass.next
        continue
      }
    }
    regex += escapeRegex(char)
    index += 1
  }
  regex += "$"
  return new RegExp(regex, "s")
}

/**
 * Compile glob patterns into anchored regexes.
 *
 * @pure true
 * @complexity O(n) where n = total pattern length
 */
export const compileGlobs = (patterns: ReadonlyArray<string>): ReadonlyArray<RegExp> =>
  patterns.map((pattern) => globToRegex(pattern))

export const matchesAnyGlob = (
  globs: ReadonlyArray<RegExp>,
  candidate: string
): boolean => globs.some((glob) => glob.test(candidate))

/**
 * Drop every path matched by at least one pattern.
 *
 * @param paths - Absolute venv paths.
 * @param patterns - Shell-style globs; an empty list keeps everything.
 * @returns Remaining paths in input order.
 *
 * @pure true
 * @complexity O(n·k)
 */
export const filterPaths = (
  paths: ReadonlyArray<string>,
  patterns: ReadonlyArray<string>
): ReadonlyArray<string> => {
  if (patterns.length === 0) {
    return paths
  }
  const globs = compileGlobs(patterns)
  return paths.filter((candidate) => !matchesAnyGlob(globs, candidate))
}

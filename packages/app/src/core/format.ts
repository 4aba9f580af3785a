// CHANGE: human-readable formatting for sizes, ages, and timestamps
// WHY: reports and log fields share one rendering of each quantity
// FORMAT THEOREM: ∀n ≥ 0: formatSize(n) ends with one of B, KB, MB, GB
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: KB/MB keep one decimal, GB keeps two
// COMPLEXITY: O(1)/O(1)

export const KIB = 1024
export const MIB = KIB * 1024
export const GIB = MIB * 1024

/**
 * Render a byte count with a binary unit.
 *
 * @param sizeBytes - Non-negative byte count.
 * @returns e.g. "500 B", "1.5 KB", "1.4 MB", "1.40 GB".
 *
 * @pure true
 * @complexity O(1)
 */
export const formatSize = (sizeBytes: number): string => {
  if (sizeBytes < KIB) {
    return `${sizeBytes} B`
  }
  if (sizeBytes < MIB) {
    return `${(sizeBytes / KIB).toFixed(1)} KB`
  }
  if (sizeBytes < GIB) {
    return `${(sizeBytes / MIB).toFixed(1)} MB`
  }
  return `${(sizeBytes / GIB).toFixed(2)} GB`
}

export const formatMegabytes = (sizeBytes: number): string => (sizeBytes / MIB).toFixed(1)

export const formatDays = (days: number): string => days.toFixed(1)

const pad2 = (value: number): string => String(value).padStart(2, "0")

// local time, "YYYY-MM-DD HH:MM:SS"
export const formatTimestamp = (date: Date): string =>
  `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
  `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`

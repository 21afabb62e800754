/** Bytes → `"12.34 MB"`. */
export function formatMegabytes(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(2)} MB`
}

/** Output/input ratio → `"0.42x"`. */
export function formatRatio(ratio: number): string {
  return `${ratio.toFixed(2)}x`
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`
  }

  const seconds = ms / 1000
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`
  }

  const minutes = Math.floor(seconds / 60)
  const remainingSeconds = Math.round(seconds % 60)
  return `${minutes}m ${remainingSeconds}s`
}

/**
 * Renders library results as fixed-width rows under a header.
 */
export function formatResultTable(rows: Array<{name: string; status: string; exitCode?: number; durationMs: number}>): string[] {
  const nameWidth = Math.max('LIBRARY'.length, ...rows.map(r => r.name.length))
  const statusWidth = Math.max('STATUS'.length, ...rows.map(r => r.status.length))
  const lines = [`${'LIBRARY'.padEnd(nameWidth)}  ${'STATUS'.padEnd(statusWidth)}  EXIT  DURATION`]

  for (const row of rows) {
    const exit = row.exitCode === undefined ? '-' : String(row.exitCode)
    lines.push(`${row.name.padEnd(nameWidth)}  ${row.status.padEnd(statusWidth)}  ${exit.padStart(4)}  ${formatDuration(row.durationMs)}`)
  }

  return lines
}

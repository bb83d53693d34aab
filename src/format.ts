// Text formatting helpers shared by value cells and the query engine

const DURATION_UNITS: Array<[string, number]> = [
  ["day", 86_400],
  ["hour", 3_600],
  ["minute", 60],
  ["second", 1],
]

export function pluralize(count: number, unit: string): string {
  return count === 1 ? `${count} ${unit}` : `${count} ${unit}s`
}

/**
 * Break a number of seconds into days, hours, minutes and seconds.
 * Leading zero components are omitted; once a component is shown every
 * smaller one follows it.
 */
export function formatDuration(totalSeconds: number): string {
  let remaining = Math.floor(totalSeconds)
  const parts: string[] = []
  for (const [unit, size] of DURATION_UNITS) {
    const amount = Math.floor(remaining / size)
    remaining -= amount * size
    if (amount !== 0 || parts.length > 0) {
      parts.push(pluralize(amount, unit))
    }
  }
  return parts.length > 0 ? parts.join(", ") : "0 seconds"
}

function pad2(n: number): string {
  return n.toString().padStart(2, "0")
}

/** Local date-time of a unix timestamp in seconds, `YYYY-MM-DD HH:MM:SS`. */
export function formatLocalDateTime(epochSeconds: number): string {
  const d = new Date(epochSeconds * 1000)
  const date = `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())}`
  const time = `${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`
  return `${date} ${time}`
}

export function formatHumanTimestamp(epochSeconds: number): string {
  return `${epochSeconds} (${formatLocalDateTime(epochSeconds)})`
}

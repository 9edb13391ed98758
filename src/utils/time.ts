const MINUTE = 60
const HOUR = 60 * MINUTE
const DAY = 24 * HOUR
const WEEK = 7 * DAY
const MONTH = 30 * DAY

/** Compact age such as `5m ago` or `2w ago`; future times read as `just now`. */
export const formatRelativeTime = (date: Date, now: Date = new Date()): string => {
  const seconds = Math.floor((now.getTime() - date.getTime()) / 1000)
  if (seconds < MINUTE) {
    return "just now"
  }
  if (seconds < HOUR) {
    return `${String(Math.floor(seconds / MINUTE))}m ago`
  }
  if (seconds < DAY) {
    return `${String(Math.floor(seconds / HOUR))}h ago`
  }
  if (seconds < WEEK) {
    return `${String(Math.floor(seconds / DAY))}d ago`
  }
  if (seconds < MONTH) {
    return `${String(Math.floor(seconds / WEEK))}w ago`
  }
  return `${String(Math.floor(seconds / MONTH))}mo ago`
}

const pad2 = (value: number): string => {
  return String(value).padStart(2, "0")
}

/** Local `YYYY-MM-DD HH:MM`. */
export const formatTimestamp = (date: Date): string => {
  return `${String(date.getFullYear())}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ${pad2(date.getHours())}:${pad2(date.getMinutes())}`
}

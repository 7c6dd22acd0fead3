export function buildAvailableMessage(url: string): string {
  return `Attention! Tickets may be available on ${url}`
}

export function buildChangedMessage(url: string): string {
  return `Attention! The page ${url} changed, but tickets are still marked as coming later.`
}

export function buildHeartbeatMessage(): string {
  return 'Daily update: no changes detected on the monitored pages.'
}

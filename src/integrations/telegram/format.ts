export const TELEGRAM_MAX_MESSAGE_LENGTH = 4096

function normalizeText(value: string): string {
  return value
    .replace(/\r\n/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim()
}

function hardSplit(unit: string, limit: number): string[] {
  const chunks: string[] = []
  let offset = 0
  while (unit.length - offset > limit) {
    const window = unit.slice(offset, offset + limit)
    const breakAt = Math.max(window.lastIndexOf('\n'), window.lastIndexOf(' '))
    if (breakAt > 0) {
      chunks.push(window.slice(0, breakAt).trim())
      offset += breakAt + 1
    }
    else {
      chunks.push(window)
      offset += limit
    }
  }
  chunks.push(unit.slice(offset).trim())
  return chunks
}

function splitByLength(value: string, separator: string, limit: number): string[] {
  if (value.length <= limit) return [value]

  const chunks: string[] = []
  let current = ''

  for (const unitRaw of value.split(separator)) {
    const unit = unitRaw.trim()
    if (unit.length === 0) continue
    const next = current.length > 0 ? `${current}${separator}${unit}` : unit
    if (next.length <= limit) {
      current = next
      continue
    }
    if (current.length > 0) {
      chunks.push(current)
      current = ''
    }
    if (unit.length <= limit) {
      current = unit
      continue
    }

    const pieces = hardSplit(unit, limit)
    current = pieces.pop() ?? ''
    chunks.push(...pieces)
  }

  if (current.length > 0) {
    chunks.push(current)
  }

  return chunks.filter(chunk => chunk.length > 0)
}

/** Plain-text message split into chunks Telegram accepts, paragraphs first. */
export function toTelegramTextMessages(message: string, limit = TELEGRAM_MAX_MESSAGE_LENGTH): string[] {
  const text = normalizeText(message)
  if (text.length === 0) return []
  return splitByLength(text, '\n\n', limit).flatMap(part => splitByLength(part, '\n', limit))
}

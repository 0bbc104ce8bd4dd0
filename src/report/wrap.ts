export const textWidth = (text: string): number => Array.from(text).length

const chunk = (word: string, width: number): string[] => {
  const chars = Array.from(word)
  const parts: string[] = []
  for (let i = 0; i < chars.length; i += width)
    parts.push(chars.slice(i, i + width).join(''))
  return parts
}

/**
 * Greedy word wrap: whitespace runs collapse to single spaces, and words
 * longer than `width` are split into `width`-sized pieces. Widths count code
 * points, so surrogate pairs are never split.
 */
export const wrapText = (text: string, width: number): string[] => {
  if (width < 1) throw new RangeError(`wrap width must be positive: ${width}`)
  const words = text.split(/\s+/).filter((word) => word.length > 0)
  const lines: string[] = []
  let current = ''
  for (const word of words) {
    const pieces = textWidth(word) > width ? chunk(word, width) : [word]
    for (const piece of pieces) {
      if (!current) {
        current = piece
        continue
      }
      if (textWidth(current) + 1 + textWidth(piece) <= width) {
        current = `${current} ${piece}`
        continue
      }
      lines.push(current)
      current = piece
    }
  }
  if (current) lines.push(current)
  return lines
}

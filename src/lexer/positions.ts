// Line splicing and offset -> line/column mapping.
//
// Backslash-newline pairs are removed before tokenization, as the C translation
// phases require. The scanner then works on the joined text, and positions are
// mapped back to the original source through `origin`.

const CH_NEWLINE = 0x0a // '\n'
const CH_RETURN = 0x0d // '\r'
const CH_BSLASH = 0x5c // '\'

export interface SourcePosition {
  line: number // 1-based
  column: number // 1-based
}

function buildLineOffsets(source: string): number[] {
  const offsets = [0]
  for (let i = 0; i < source.length; i++) {
    if (source.charCodeAt(i) === CH_NEWLINE) {
      offsets.push(i + 1)
    }
  }
  return offsets
}

function clampOffset(offset: number, sourceLength: number): number {
  if (!Number.isFinite(offset)) return 0
  if (offset <= 0) return 0
  if (offset >= sourceLength) return sourceLength
  return Math.trunc(offset)
}

export class SourceText {
  /** Source with every backslash-newline removed. */
  readonly text: string
  private readonly original: string
  // Original offset of each joined offset; null when nothing was spliced.
  private readonly origin: number[] | null
  private lineOffsets: number[] | null = null

  constructor(source: string) {
    this.original = source
    if (source.indexOf('\\') === -1) {
      this.text = source
      this.origin = null
      return
    }

    const parts: string[] = []
    const origin: number[] = []
    let chunkStart = 0
    let i = 0
    while (i < source.length) {
      if (source.charCodeAt(i) === CH_BSLASH) {
        let nl = 0
        if (source.charCodeAt(i + 1) === CH_NEWLINE) {
          nl = 2
        } else if (
          source.charCodeAt(i + 1) === CH_RETURN &&
          source.charCodeAt(i + 2) === CH_NEWLINE
        ) {
          nl = 3
        }
        if (nl > 0) {
          parts.push(source.substring(chunkStart, i))
          i += nl
          chunkStart = i
          continue
        }
      }
      origin.push(i)
      i++
    }
    parts.push(source.substring(chunkStart))
    origin.push(source.length)

    this.text = parts.join('')
    this.origin = origin
  }

  /** Map an offset in the joined text back to the original source. */
  originalOffset(offset: number): number {
    if (this.origin === null) return clampOffset(offset, this.original.length)
    const clamped = clampOffset(offset, this.text.length)
    return this.origin[clamped]
  }

  position(offset: number): SourcePosition {
    if (this.lineOffsets === null) {
      this.lineOffsets = buildLineOffsets(this.original)
    }
    const lineOffsets = this.lineOffsets
    const target = this.originalOffset(offset)

    // Binary search for the line containing this offset.
    let lo = 0
    let hi = lineOffsets.length - 1
    while (lo < hi) {
      const mid = (lo + hi + 1) >>> 1
      if (lineOffsets[mid] <= target) {
        lo = mid
      } else {
        hi = mid - 1
      }
    }

    return { line: lo + 1, column: target - lineOffsets[lo] + 1 }
  }
}

import type { Expression, SourcePosition } from './nodes'

function buildLineOffsets(source: string): number[] {
  const offsets = [0]
  for (let i = 0; i < source.length; i++) {
    if (source.charCodeAt(i) === 10) {
      // '\n'
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

function positionFor(
  offset: number,
  lineOffsets: number[],
  sourceLength: number,
): SourcePosition {
  const clamped = clampOffset(offset, sourceLength)

  // Binary search for the line containing this offset.
  let lo = 0
  let hi = lineOffsets.length - 1
  while (lo < hi) {
    const mid = (lo + hi + 1) >>> 1
    if (lineOffsets[mid] <= clamped) {
      lo = mid
    } else {
      hi = mid - 1
    }
  }

  return { line: lo + 1, column: clamped - lineOffsets[lo] }
}

// Line/column of a single offset, for diagnostics.
export function locate(source: string, offset: number): SourcePosition {
  return positionFor(offset, buildLineOffsets(source), source.length)
}

/**
 * Attach `loc` to every node of the tree when `includeLoc` is set,
 * strip it otherwise.
 */
export function normalizeAstLocations(root: Expression, source: string, includeLoc: boolean): void {
  const lineOffsets = includeLoc ? buildLineOffsets(source) : []
  const sourceLength = source.length
  const stack: Expression[] = [root]

  while (stack.length > 0) {
    const current = stack.pop()
    if (current === undefined) break

    if (includeLoc) {
      current.loc = {
        start: positionFor(current.start, lineOffsets, sourceLength),
        end: positionFor(current.end, lineOffsets, sourceLength),
      }
    } else {
      delete current.loc
    }

    if (current.type === 'BinaryExpression') {
      stack.push(current.right, current.left)
    }
  }
}

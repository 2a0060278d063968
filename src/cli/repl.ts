import { createInterface } from 'node:readline'
import type { Readable, Writable } from 'node:stream'
import { calculate, type CalculateOptions } from '../index'
import { ExpressionError } from '../errors'

export interface ReplOptions extends CalculateOptions {
  input: Readable
  output: Writable
  // Default: '> '
  prompt?: string
}

export type LineResult = { kind: 'skip' } | { kind: 'exit' } | { kind: 'print'; text: string }

/**
 * Handle one line of interactive input. Expression errors become a printable
 * line; anything else is a bug and propagates.
 */
export function handleLine(line: string, options?: CalculateOptions): LineResult {
  const text = line.trim()
  if (text === '') return { kind: 'skip' }
  if (text.toLowerCase() === 'exit') return { kind: 'exit' }
  try {
    // The untrimmed line, so error offsets match what was typed.
    return { kind: 'print', text: String(calculate(line, options)) }
  } catch (err) {
    if (err instanceof ExpressionError) {
      return { kind: 'print', text: `${err.name}: ${err.message} (at offset ${err.start})` }
    }
    throw err
  }
}

// Read-eval-print loop. Resolves when the user types `exit` or input ends.
export async function runRepl(options: ReplOptions): Promise<void> {
  const { input, output } = options
  const prompt = options.prompt ?? '> '
  const rl = createInterface({ input, terminal: false })

  try {
    output.write(prompt)
    for await (const line of rl) {
      const result = handleLine(line, options)
      if (result.kind === 'exit') {
        output.write('Bye.\n')
        return
      }
      if (result.kind === 'print') {
        output.write(`${result.text}\n`)
      }
      output.write(prompt)
    }
    output.write('\n')
  } finally {
    rl.close()
  }
}

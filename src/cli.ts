#!/usr/bin/env node
import { runRepl } from './cli/repl'

function usage(): void {
  console.log('calc-expr: type an arithmetic expression, or "exit" to quit')
  console.log('options: --strict-division   fail on division by zero instead of printing Infinity')
}

async function main(): Promise<void> {
  const args = process.argv.slice(2)
  if (args.includes('--help') || args.includes('-h')) return usage()
  await runRepl({
    input: process.stdin,
    output: process.stdout,
    divisionByZero: args.includes('--strict-division') ? 'throw' : 'ieee',
  })
}

main().catch((e: unknown) => {
  console.error(e)
  process.exit(1)
})

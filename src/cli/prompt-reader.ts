import { createInterface } from 'node:readline'

import type { EventEmitter } from 'node:events'
import type { Readable, Writable } from 'node:stream'

export type PromptReaderOptions = {
  /**
   * Emitter of `SIGINT` (usually `process`). Needed when input is not a TTY,
   * since readline only sees Ctrl+C in terminal mode.
   */
  interrupts?: EventEmitter
}

export type PromptReader = {
  read: (prompt: string) => Promise<string | null>
  close: () => void
}

/**
 * Line reader over a stream. Lines that arrive while the caller is busy are
 * buffered by the async iterator, so piped input is consumed in order even
 * after the input has ended. Ctrl+C closes the interface, which reads as end
 * of input.
 */
export const createPromptReader = (
  input: Readable,
  output: Writable,
  options: PromptReaderOptions = {},
): PromptReader => {
  const rl = createInterface({
    input,
    output,
    crlfDelay: Infinity,
    terminal: 'isTTY' in input && input.isTTY === true,
  })
  let interfaceClosed = false
  let exhausted = false
  rl.on('close', () => {
    interfaceClosed = true
  })
  const lines = rl[Symbol.asyncIterator]()

  const close = (): void => {
    exhausted = true
    options.interrupts?.off('SIGINT', close)
    if (!interfaceClosed) rl.close()
  }
  rl.on('SIGINT', close)
  options.interrupts?.once('SIGINT', close)

  return {
    read: async (prompt) => {
      if (exhausted) return null
      if (interfaceClosed) output.write(prompt)
      else {
        rl.setPrompt(prompt)
        rl.prompt()
      }
      const next = await lines.next()
      if (next.done) {
        exhausted = true
        return null
      }
      return next.value
    },
    close,
  }
}

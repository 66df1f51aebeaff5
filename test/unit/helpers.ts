import pino from 'pino'

export type CapturedLine = { level: number; msg?: string; [k: string]: unknown }

// pino logger writing synchronously into an array of parsed JSON lines
export function captureLogger(level: pino.LevelWithSilent = 'debug') {
  const lines: CapturedLine[] = []
  const logger = pino({ level }, { write: (msg: string) => { lines.push(JSON.parse(msg)) } })
  return { logger, lines }
}

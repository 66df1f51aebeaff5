export type LogData = Record<string, unknown>

/**
 * Informational sink the router reports its decisions to. Observational only:
 * nothing written here feeds back into routing.
 */
export interface RouterLogSink {
  info(message: string, data?: LogData): void
}

export const noopLogSink: RouterLogSink = { info: () => {} }

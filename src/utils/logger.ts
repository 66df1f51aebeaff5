import pino from 'pino'
import { Disposition } from '@addrnet/dto'
import type { RoutingError } from '@addrnet/reasons'
import type { LogData, RouterLogSink } from '@addrnet/router'

// create default logger; run() applies the validated LOG_LEVEL, tests can replace via setLogger
let logger: pino.BaseLogger = pino({ level: 'info' })

export function setLogger(l: pino.BaseLogger) {
  logger = l
}

export function getLogger(): pino.BaseLogger {
  return logger
}

/**
 * Adapts a pino logger to the router's log sink. Without an explicit target the sink
 * follows whatever module logger is current at write time.
 */
export function createLogSink(target?: pino.BaseLogger): RouterLogSink {
  return {
    info: (message: string, data?: LogData) => {
      const l = target ?? logger
      if (data) l.info(data, message)
      else l.info(message)
    },
  }
}

export function logRejection(err: RoutingError, destination?: string): void {
  const base = {
    event: 'router.rejected',
    kind: err.kind,
    code: err.reason.code,
    disposition: err.reason.disposition,
    destination,
    context: err.reason.context,
  }

  if (err.reason.disposition === Disposition.DELIVERED) logger.info(base, err.message)
  else logger.warn(base, err.message)
}

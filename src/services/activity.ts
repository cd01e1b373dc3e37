import { ActivitySink, AssistantState } from '../orchestrator/types.js';
import { Logger, logger as defaultLogger } from '../utils/logger.js';

export const NOOP_ACTIVITY: ActivitySink = {
  log: () => {},
  setState: () => {}
};

/**
 * Wraps a sink so that nothing it throws reaches the caller.
 */
export function safeActivity(sink: ActivitySink, log: Logger = defaultLogger): ActivitySink {
  return {
    log: (message: string) => {
      try {
        sink.log(message);
      } catch (error) {
        log.debug(`Activity sink failed to log: ${error instanceof Error ? error.message : String(error)}`);
      }
    },
    setState: (state: AssistantState, message?: string) => {
      try {
        sink.setState(state, message);
      } catch (error) {
        log.debug(`Activity sink failed to set state ${state}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  };
}

export class LoggerActivitySink implements ActivitySink {
  private target: Logger;

  constructor(log: Logger = defaultLogger) {
    this.target = log;
  }

  log(message: string): void {
    this.target.debug(`[activity] ${message}`);
  }

  setState(state: AssistantState, message?: string): void {
    this.target.debug(`[state] ${state}${message ? `: ${message}` : ''}`);
  }
}

/**
 * Pino Activity Logger
 * Layer: Infrastructure
 *
 * Writes each catalog access as an `info` line on a child of the app's pino
 * logger, tagged `component: "ActivityLogger"`. Pino stamps every line with
 * the wall-clock time, so the line carries both the timestamp and the message.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { IActivityLogger } from '@domain/interfaces/IActivityLogger';
import { inject, injectable } from 'tsyringe';

@injectable()
export class PinoActivityLogger implements IActivityLogger {
  private readonly logger: Logger;

  constructor(@inject(TOKENS.Logger) logger: Logger) {
    this.logger = logger.child({ component: 'ActivityLogger' });
  }

  log(message: string): void {
    this.logger.info(message);
  }
}

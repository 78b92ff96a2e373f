import type { LogSink } from '../core/logger.js';
import type { AlertContext, AlertService } from './interface.js';

export class ConsoleAlertService implements AlertService {
  constructor(private readonly sink: LogSink = process.stdout) {}

  async notify(title: string, message: string, context?: AlertContext): Promise<void> {
    this.sink.write(`${JSON.stringify({ ts: new Date().toISOString(), alert: title, message, ...context })}\n`);
  }
}

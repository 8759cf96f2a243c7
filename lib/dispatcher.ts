import logger from './logger';
import { errorMessage } from './errors';
import { formatEvent } from './format';
import { incAlert, incNotificationFailure } from './metrics';
import type { MonitorEvent, NotificationSink } from './types';

/**
 * Turns monitor events into sink messages. `dispatch` never rejects: a sink
 * failure is logged and counted, and the caller moves on.
 */
export class EventDispatcher {
  constructor(private readonly sink: NotificationSink) {}

  async dispatch(event: MonitorEvent): Promise<void> {
    if (event.type === 'alert') incAlert(event.newSubdomains.length);

    const text = formatEvent(event);
    let delivered: boolean;
    try {
      delivered = await this.sink.send(text);
    } catch (err) {
      logger.error({ err: errorMessage(err), type: event.type, domain: domainOf(event) }, 'notification sink threw');
      incNotificationFailure();
      return;
    }
    if (!delivered) {
      logger.error({ type: event.type, domain: domainOf(event) }, 'notification was not delivered');
      incNotificationFailure();
    }
  }
}

function domainOf(event: MonitorEvent): string | undefined {
  return event.type === 'pass' ? undefined : event.domain;
}

/** Sink that only writes to the log; used when no chat transport is configured. */
export class LogSink implements NotificationSink {
  async send(text: string): Promise<boolean> {
    logger.info({ notification: text }, 'notification');
    return true;
  }
}

export default EventDispatcher;

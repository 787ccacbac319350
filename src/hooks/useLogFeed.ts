/**
 * useLogFeed hook – the newest log events at or above a level, kept current
 * through a logger subscription.
 */

import { useEffect, useState } from 'react';
import { isAtLeast, logger } from '../utils/logger';
import type { LogEvent, LogLevel } from '../utils/logger';

export function useLogFeed(minLevel: LogLevel = 'warn', limit: number = 3): LogEvent[] {
  const [events, setEvents] = useState<LogEvent[]>(() => logger.recent(minLevel, limit));

  useEffect(() => {
    setEvents(logger.recent(minLevel, limit));
    return logger.subscribe(event => {
      if (isAtLeast(event, minLevel)) setEvents(logger.recent(minLevel, limit));
    });
  }, [minLevel, limit]);

  return events;
}

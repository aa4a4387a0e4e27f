import { HOUR_MS, addHours } from './time';

export type SlaStatus = 'ok' | 'warning' | 'urgent';

export type FollowupPriority = 'low' | 'medium' | 'high' | 'urgent';

export const SLA_WARNING_HOURS = 4;
export const SLA_URGENT_HOURS = 24;

export const FOLLOWUP_OFFSET_HOURS: Record<FollowupPriority, number> = {
  low: 72,
  medium: 24,
  high: 4,
  urgent: 1,
};

export type SlaMessage = {
  direction: 'in' | 'out';
  receivedAt: string;
};

export type SlaResult = {
  status: SlaStatus;
  lastInboundAt: string | null;
  elapsedHours: number | null;
  answered: boolean;
};

export function getSlaStatusForElapsed(elapsedMs: number): SlaStatus {
  if (elapsedMs >= SLA_URGENT_HOURS * HOUR_MS) {
    return 'urgent';
  }
  if (elapsedMs >= SLA_WARNING_HOURS * HOUR_MS) {
    return 'warning';
  }
  return 'ok';
}

/**
 * Derives a thread's urgency from its messages. Order of `messages` does not
 * matter; the latest by `receivedAt` decides whether the thread is answered.
 */
export function computeSla(messages: SlaMessage[], now: Date): SlaResult {
  let latest: SlaMessage | null = null;
  let lastInboundAt: string | null = null;

  for (const message of messages) {
    if (!latest || message.receivedAt >= latest.receivedAt) {
      latest = message;
    }
    if (
      message.direction === 'in' &&
      (!lastInboundAt || message.receivedAt > lastInboundAt)
    ) {
      lastInboundAt = message.receivedAt;
    }
  }

  if (!latest || latest.direction === 'out' || !lastInboundAt) {
    return { status: 'ok', lastInboundAt, elapsedHours: null, answered: true };
  }

  const elapsedMs = Math.max(0, now.getTime() - Date.parse(lastInboundAt));
  return {
    status: getSlaStatusForElapsed(elapsedMs),
    lastInboundAt,
    elapsedHours: elapsedMs / HOUR_MS,
    answered: false,
  };
}

export function suggestFollowupAt(priority: FollowupPriority, now: Date): Date {
  return addHours(now, FOLLOWUP_OFFSET_HOURS[priority]);
}

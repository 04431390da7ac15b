import { hasEnded, hasStarted, TicketedEvent } from './event';

export interface TicketSalesStatus {
  open: boolean;
  message: string;
  closesIn: string | null;
}

/**
 * Sales close once the event starts and are only ever open for published events.
 */
export function isTicketSalesOpen(event: TicketedEvent, now: Date): boolean {
  return event.status === 'published' && now.getTime() < event.startTime.getTime();
}

export function ticketSalesMessage(event: TicketedEvent, now: Date): string {
  if (hasEnded(event, now)) {
    return 'This event has ended';
  }
  if (hasStarted(event, now)) {
    return 'Ticket sales have ended (event has started)';
  }
  if (event.status !== 'published') {
    return 'This event is not available for ticket purchase';
  }
  return 'Tickets available';
}

/**
 * Compact countdown until sales close, e.g. "2d 5h", "3h 20m" or "45m".
 */
export function formatTimeUntilSalesClose(event: TicketedEvent, now: Date): string | null {
  if (!isTicketSalesOpen(event, now)) {
    return null;
  }

  const remainingSeconds = Math.floor((event.startTime.getTime() - now.getTime()) / 1000);
  const days = Math.floor(remainingSeconds / 86_400);
  const hours = Math.floor((remainingSeconds % 86_400) / 3_600);
  const minutes = Math.floor((remainingSeconds % 3_600) / 60);

  if (days > 0) {
    return `${days}d ${hours}h`;
  }
  if (hours > 0) {
    return `${hours}h ${minutes}m`;
  }
  return `${minutes}m`;
}

export function describeTicketSales(event: TicketedEvent, now: Date): TicketSalesStatus {
  return {
    open: isTicketSalesOpen(event, now),
    message: ticketSalesMessage(event, now),
    closesIn: formatTimeUntilSalesClose(event, now),
  };
}

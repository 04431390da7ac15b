import assert from 'node:assert/strict';
import test from 'node:test';
import { buildEvent, hoursAfter } from '../testing/eventBuilders';
import { describeTicketSales, formatTimeUntilSalesClose, isTicketSalesOpen, ticketSalesMessage } from './ticketSales';

test('Ticket sales', async t => {
  const event = buildEvent();

  await t.test('open for published events before they start', () => {
    const now = hoursAfter(event.startTime, -3);
    assert.equal(isTicketSalesOpen(event, now), true);
    assert.equal(ticketSalesMessage(event, now), 'Tickets available');
  });

  await t.test('close at the start instant', () => {
    assert.equal(isTicketSalesOpen(event, event.startTime), false);
    assert.equal(ticketSalesMessage(event, event.startTime), 'Ticket sales have ended (event has started)');
    assert.equal(formatTimeUntilSalesClose(event, event.startTime), null);
  });

  await t.test('explain why sales are closed', () => {
    const before = hoursAfter(event.startTime, -3);
    assert.equal(
      ticketSalesMessage({ ...event, status: 'draft' }, before),
      'This event is not available for ticket purchase'
    );
    assert.equal(ticketSalesMessage(event, hoursAfter(event.endTime, 1)), 'This event has ended');
  });

  await t.test('countdown uses the largest two units', () => {
    assert.equal(formatTimeUntilSalesClose(event, hoursAfter(event.startTime, -53)), '2d 5h');
    assert.equal(
      formatTimeUntilSalesClose(event, new Date(event.startTime.getTime() - (3 * 60 + 20) * 60 * 1000)),
      '3h 20m'
    );
    assert.equal(formatTimeUntilSalesClose(event, new Date(event.startTime.getTime() - 45 * 60 * 1000)), '45m');
  });

  await t.test('describe bundles the three views', () => {
    assert.deepEqual(describeTicketSales(event, hoursAfter(event.startTime, -1)), {
      open: true,
      message: 'Tickets available',
      closesIn: '1h 0m',
    });
  });
});

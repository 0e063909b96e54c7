/**
 * Unit tests for NotificationDispatcher.
 *
 * Uses an in-memory RSVP store and a recording transport so each test can
 * assert exactly who was contacted and what was logged.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { MS_PER_HOUR, MemoryLogger, toIso } from "@campus-events/shared";
import type { CampusEvent, Rsvp } from "@campus-events/shared";
import { InMemoryRsvpStore } from "./rsvp-store";
import { NotificationDispatcher } from "./notification-dispatcher";
import {
  LoggingNotificationTransport,
  buildCancellationEmail,
} from "./notification-transport";
import type { NotificationMessage, NotificationTransport } from "./notification-transport";

// ---------------------------------------------------------------------------
// Test helpers
// ---------------------------------------------------------------------------

const NOW = Date.parse("2025-03-10T12:00:00.000Z");

class RecordingTransport implements NotificationTransport {
  readonly messages: NotificationMessage[] = [];
  readonly rejectFor = new Set<string>();
  readonly throwFor = new Set<string>();

  send(message: NotificationMessage): boolean {
    if (this.throwFor.has(message.recipientId)) {
      throw new Error("mail relay unavailable");
    }
    this.messages.push(message);
    return !this.rejectFor.has(message.recipientId);
  }
}

function makeEvent(hoursAhead: number, overrides: Partial<CampusEvent> = {}): CampusEvent {
  return {
    id: "evt_review",
    title: "CS101 Final Review",
    description: "",
    start_at: toIso(NOW + hoursAhead * MS_PER_HOUR),
    end_at: toIso(NOW + (hoursAhead + 2) * MS_PER_HOUR),
    location: "STEM 201",
    organizer_id: "usr_prof",
    organizer_name: "Dr. Edwards",
    status: "CANCELED",
    cancellation_reason: "Instructor ill",
    canceled_at: toIso(NOW),
    canceled_by: "usr_prof",
    created_at: "2025-03-01T08:00:00.000Z",
    ...overrides,
  };
}

function makeRsvp(id: string, eventId: string, studentId: string, status: Rsvp["status"] = "CONFIRMED"): Rsvp {
  return {
    id,
    event_id: eventId,
    student_id: studentId,
    student_name: `Student ${studentId}`,
    student_email: `${studentId}@example.edu`,
    status,
    created_at: "2025-03-05T10:00:00.000Z",
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("NotificationDispatcher", () => {
  let store: InMemoryRsvpStore;
  let transport: RecordingTransport;
  let logger: MemoryLogger;
  let dispatcher: NotificationDispatcher;

  beforeEach(() => {
    store = new InMemoryRsvpStore();
    transport = new RecordingTransport();
    logger = new MemoryLogger();
    dispatcher = new NotificationDispatcher(store, transport, { now: () => NOW, logger });
  });

  it("sends nothing for an event with zero RSVPs", () => {
    const summary = dispatcher.notifyCancellation(makeEvent(72));

    expect(summary).toEqual({
      eventId: "evt_review",
      eventTitle: "CS101 Final Review",
      kind: "CANCELLATION",
      rsvpCount: 0,
      notificationsSent: 0,
      urgent: false,
      hoursUntilEvent: 72,
      notifiedRecipientIds: [],
      timestamp: "2025-03-10T12:00:00.000Z",
    });
    expect(transport.messages).toEqual([]);
    expect(dispatcher.getLogs()).toEqual([]);
  });

  it("notifies every CONFIRMED RSVP and skips withdrawn ones", () => {
    store.add(makeRsvp("rsv_1", "evt_review", "usr_a"));
    store.add(makeRsvp("rsv_2", "evt_review", "usr_b", "CANCELED"));
    store.add(makeRsvp("rsv_3", "evt_review", "usr_c"));
    store.add(makeRsvp("rsv_4", "evt_other", "usr_d"));

    const summary = dispatcher.notifyCancellation(makeEvent(72));

    expect(summary.rsvpCount).toBe(2);
    expect(summary.notificationsSent).toBe(2);
    expect(summary.notifiedRecipientIds).toEqual(["usr_a", "usr_c"]);

    const logs = dispatcher.getLogs();
    expect(logs).toHaveLength(2);
    expect(logs[0]).toMatchObject({
      recipient_id: "usr_a",
      recipient_name: "Student usr_a",
      recipient_email: "usr_a@example.edu",
      event_id: "evt_review",
      event_title: "CS101 Final Review",
      kind: "CANCELLATION",
      sent_at: "2025-03-10T12:00:00.000Z",
      urgent: false,
    });
    expect(logs[0]?.id.startsWith("ntf_")).toBe(true);
  });

  it("flags notifications inside the 24 hour window as urgent", () => {
    store.add(makeRsvp("rsv_1", "evt_review", "usr_a"));

    const summary = dispatcher.notifyCancellation(makeEvent(8));

    expect(summary.urgent).toBe(true);
    expect(summary.hoursUntilEvent).toBe(8);
    expect(transport.messages[0]?.subject).toBe("[URGENT] Canceled: CS101 Final Review");
    expect(dispatcher.getLogs()[0]?.urgent).toBe(true);
  });

  it("honors a custom urgency threshold", () => {
    const custom = new NotificationDispatcher(store, transport, {
      now: () => NOW,
      lateCancellationHours: 96,
    });
    expect(custom.notifyCancellation(makeEvent(72)).urgent).toBe(true);
  });

  it("counts a false return as not sent", () => {
    store.add(makeRsvp("rsv_1", "evt_review", "usr_a"));
    store.add(makeRsvp("rsv_2", "evt_review", "usr_b"));
    transport.rejectFor.add("usr_a");

    const summary = dispatcher.notifyCancellation(makeEvent(72));

    expect(summary.rsvpCount).toBe(2);
    expect(summary.notificationsSent).toBe(1);
    expect(summary.notifiedRecipientIds).toEqual(["usr_b"]);
    expect(dispatcher.getLogs().map((e) => e.recipient_id)).toEqual(["usr_b"]);
  });

  it("keeps going after a transport error and logs it", () => {
    store.add(makeRsvp("rsv_1", "evt_review", "usr_a"));
    store.add(makeRsvp("rsv_2", "evt_review", "usr_b"));
    transport.throwFor.add("usr_a");

    const summary = dispatcher.notifyCancellation(makeEvent(72));

    expect(summary.notificationsSent).toBe(1);
    expect(logger.at("error")).toEqual([
      {
        level: "error",
        message: "notification delivery failed",
        fields: { eventId: "evt_review", recipientId: "usr_a", error: "mail relay unavailable" },
      },
    ]);
  });

  it("sends restoration notices", () => {
    store.add(makeRsvp("rsv_1", "evt_review", "usr_a"));
    const event = makeEvent(72, {
      status: "SCHEDULED",
      cancellation_reason: null,
      canceled_at: null,
      canceled_by: null,
    });

    const summary = dispatcher.notifyRestoration(event);

    expect(summary.kind).toBe("RESTORATION");
    expect(transport.messages[0]?.subject).toBe("Back on: CS101 Final Review");
    expect(dispatcher.getLogs()[0]?.kind).toBe("RESTORATION");
  });

  it("filters logs by event and recipient", () => {
    store.add(makeRsvp("rsv_1", "evt_review", "usr_a"));
    store.add(makeRsvp("rsv_2", "evt_review", "usr_b"));
    store.add(makeRsvp("rsv_3", "evt_other", "usr_a"));

    dispatcher.notifyCancellation(makeEvent(72));
    dispatcher.notifyCancellation(makeEvent(72, { id: "evt_other" }));

    expect(dispatcher.getLogs()).toHaveLength(3);
    expect(dispatcher.getLogs({ eventId: "evt_other" })).toHaveLength(1);
    expect(dispatcher.getLogs({ recipientId: "usr_a" })).toHaveLength(2);
    expect(dispatcher.getLogs({ eventId: "evt_review", recipientId: "usr_a" })).toHaveLength(1);
  });

  it("stores frozen log entries", () => {
    store.add(makeRsvp("rsv_1", "evt_review", "usr_a"));
    dispatcher.notifyCancellation(makeEvent(72));
    expect(Object.isFrozen(dispatcher.getLogs()[0])).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Payloads and the logging transport
// ---------------------------------------------------------------------------

describe("buildCancellationEmail", () => {
  it("includes the reason, or a placeholder when there is none", () => {
    expect(buildCancellationEmail(makeEvent(72), "Sam", false).body).toContain(
      "Reason: Instructor ill",
    );
    const noReason = buildCancellationEmail(makeEvent(72, { cancellation_reason: null }), "Sam", false);
    expect(noReason.body.split("\n")).toContain("Reason: No reason provided");
    expect(noReason.subject).toBe("Canceled: CS101 Final Review");
  });
});

describe("LoggingNotificationTransport", () => {
  it("logs the message and reports success", () => {
    const logger = new MemoryLogger();
    const transport = new LoggingNotificationTransport(logger);
    const sent = transport.send({
      kind: "CANCELLATION",
      recipientId: "usr_a",
      recipientName: "Sam",
      recipientEmail: "sam@example.edu",
      eventId: "evt_review",
      subject: "Canceled: CS101 Final Review",
      body: "",
      urgent: false,
    });

    expect(sent).toBe(true);
    expect(logger.entries).toEqual([
      {
        level: "info",
        message: "email sent",
        fields: {
          kind: "CANCELLATION",
          to: "Sam <sam@example.edu>",
          eventId: "evt_review",
          subject: "Canceled: CS101 Final Review",
          urgent: false,
        },
      },
    ]);
  });
});

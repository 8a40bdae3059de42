/**
 * Meeting Filter Tests
 */

import { describe, it, expect } from "vitest";
import {
  isAllDayAbsence,
  isMeeting,
  meetingRejection,
  normalizeHints,
  rejectsParticipation,
} from "../lib/meeting-filter.js";
import { at, createEvent } from "./helpers.js";

const hints = normalizeHints(["  Homeoffice ", "", "Fokuszeit"]);

describe("normalizeHints", () => {
  it("trims, lower-cases and drops empties", () => {
    expect(hints).toEqual(["homeoffice", "fokuszeit"]);
  });
});

describe("meetingRejection", () => {
  it("accepts a regular meeting", () => {
    expect(meetingRejection(createEvent(), hints)).toBeNull();
    expect(isMeeting(createEvent(), hints)).toBe(true);
  });

  it.each([
    ["cancelled", createEvent({ status: "CANCELLED" })],
    ["cancelled", createEvent({ title: "Abgesagt: Planning" })],
    ["all-day", createEvent({ allDay: true, start: at(0), end: at(0, 0, 24) })],
    ["crosses-midnight", createEvent({ start: at(23), end: at(1, 0, 24) })],
    ["too-long", createEvent({ start: at(7), end: at(17, 1) })],
    ["transparent", createEvent({ transparency: "TRANSPARENT" })],
    ["busy-status", createEvent({ busyStatus: "tentative" })],
    ["no-attendees", createEvent({ attendeeCount: 0 })],
    ["untitled", createEvent({ title: "   " })],
    ["non-meeting-hint", createEvent({ title: "Fokuszeit am Vormittag" })],
  ])("rejects %s", (reason, event) => {
    expect(meetingRejection(event, hints)).toBe(reason);
  });

  it("checks cancellation before anything else", () => {
    expect(meetingRejection(createEvent({ status: "CANCELLED", attendeeCount: 0 }), hints)).toBe("cancelled");
  });

  it("accepts a moved occurrence without attendee lines", () => {
    expect(meetingRejection(createEvent({ attendeeCount: 0, recurrenceId: at(9) }), hints)).toBeNull();
  });

  it("accepts exactly ten hours", () => {
    expect(meetingRejection(createEvent({ start: at(7), end: at(17) }), hints)).toBeNull();
  });
});

describe("isAllDayAbsence", () => {
  it("detects vacation titles", () => {
    expect(isAllDayAbsence(createEvent({ allDay: true, title: "Urlaub" }))).toBe(true);
  });

  it("detects out-of-office busy status", () => {
    expect(isAllDayAbsence(createEvent({ allDay: true, title: "Offsite", busyStatus: "OOF" }))).toBe(true);
  });

  it("does not treat remote work as absence", () => {
    expect(isAllDayAbsence(createEvent({ allDay: true, title: "Homeoffice", busyStatus: "OOF" }))).toBe(false);
  });

  it("ignores timed events", () => {
    expect(isAllDayAbsence(createEvent({ title: "Urlaub" }))).toBe(false);
  });
});

describe("rejectsParticipation", () => {
  it("passes events without a retained status", () => {
    expect(rejectsParticipation(createEvent())).toBe(false);
  });

  it("passes accepted and unanswered invitations", () => {
    expect(rejectsParticipation(createEvent({ selfPartstat: "ACCEPTED" }))).toBe(false);
    expect(rejectsParticipation(createEvent({ selfPartstat: "needs-action" }))).toBe(false);
  });

  it("rejects declined and tentative answers", () => {
    expect(rejectsParticipation(createEvent({ selfPartstat: "DECLINED" }))).toBe(true);
    expect(rejectsParticipation(createEvent({ selfPartstat: "TENTATIVE" }))).toBe(true);
  });
});

import { describe, it, expect, afterEach } from "vitest";
import { classifyPolicy } from "./classify.js";
import { extractPolicySchedule, intervalDuration, maxCyclicGap, minuteOfDay, weekdayIndex, windowHours } from "./extractor.js";
import {
  enableAuditDiagnostics,
  onAuditDiagnosticEvent,
  resetAuditDiagnosticsForTest,
  type AuditDiagnosticEvent,
} from "../diagnostics.js";

afterEach(() => {
  resetAuditDiagnosticsForTest();
});

describe("helpers", () => {
  it("reads minutes of day from ISO datetimes and HH:mm", () => {
    expect(minuteOfDay("2024-01-01T22:30:00Z")).toBe(1_350);
    expect(minuteOfDay("03:15")).toBe(195);
    expect(minuteOfDay("25:00")).toBeNull();
    expect(minuteOfDay("noon")).toBeNull();
  });

  it("maps weekday names and prefixes", () => {
    expect(weekdayIndex("Sunday")).toBe(0);
    expect(weekdayIndex("wed")).toBe(3);
    expect(weekdayIndex("Sa")).toBeNull();
  });

  it("measures the largest gap around a cycle", () => {
    expect(maxCyclicGap([120, 720], 1_440)).toBe(840);
    expect(maxCyclicGap([300], 1_440)).toBe(1_440);
    expect(maxCyclicGap([1, 3, 5], 7)).toBe(3);
    expect(maxCyclicGap([], 7)).toBeNull();
  });

  it("takes the trailing duration of a repeating interval", () => {
    expect(intervalDuration("R/2024-01-01T02:00:00+00:00/PT4H")).toBe("PT4H");
    expect(intervalDuration("PT12H")).toBe("PT12H");
  });

  it("reads windows as hours or ISO durations", () => {
    expect(windowHours(8)).toBe(8);
    expect(windowHours("PT7H30M")).toBe(7.5);
    expect(windowHours(0)).toBeNull();
    expect(windowHours(undefined)).toBeNull();
  });
});

describe("classifyPolicy", () => {
  it("detects classic VM policies", () => {
    const shape = classifyPolicy({
      properties: {
        schedulePolicy: { schedulePolicyType: "SimpleSchedulePolicy", scheduleRunFrequency: "Daily", scheduleRunTimes: ["2024-01-01T23:00:00Z"] },
      },
    });
    expect(shape?.kind).toBe("vm-classic");
  });

  it("detects enhanced VM policies by type or by sub-schedule", () => {
    expect(classifyPolicy({ schedulePolicy: { schedulePolicyType: "SimpleSchedulePolicyV2", scheduleRunFrequency: "Hourly" } })?.kind)
      .toBe("vm-enhanced");
    expect(classifyPolicy({ SchedulePolicy: { dailySchedule: { scheduleRunTimes: ["02:00"] } } })?.kind).toBe("vm-enhanced");
  });

  it("prefers database sub-policies over a top-level schedule", () => {
    const shape = classifyPolicy({
      subProtectionPolicy: [{ policyType: "Full", schedulePolicy: { scheduleRunFrequency: "Daily", scheduleRunTimes: ["01:00"] } }],
      schedulePolicy: { scheduleRunFrequency: "Weekly" },
    });
    expect(shape?.kind).toBe("database");
  });

  it("returns null for unknown shapes", () => {
    expect(classifyPolicy({ properties: { retentionPolicy: {} } })).toBeNull();
    expect(classifyPolicy({ schedulePolicy: { objectType: "LongTermSchedulePolicy" } })).toBeNull();
    expect(classifyPolicy("policy")).toBeNull();
  });
});

describe("extractPolicySchedule", () => {
  it("reports the explicit interval of an enhanced hourly policy", () => {
    const schedule = extractPolicySchedule({
      properties: {
        schedulePolicy: {
          schedulePolicyType: "SimpleSchedulePolicyV2",
          scheduleRunFrequency: "Hourly",
          hourlySchedule: { interval: 4, scheduleWindowStartTime: "2024-01-01T08:00:00Z", scheduleWindowDuration: 12 },
        },
      },
    });
    expect(schedule?.shape).toBe("vm-enhanced");
    expect(schedule?.cadence).toEqual({ seconds: 14_400, hours: 4, label: "Every 4 hours" });
    expect(schedule?.windowHours).toBe(12);
  });

  it("uses the largest gap between daily run times, wrapping at midnight", () => {
    const schedule = extractPolicySchedule({
      schedulePolicy: {
        scheduleRunFrequency: "Daily",
        scheduleRunTimes: ["2024-01-01T02:00:00Z", "2024-01-01T12:00:00Z"],
      },
    });
    // 02:00 → 12:00 is 10 h, 12:00 → 02:00 is 14 h
    expect(schedule?.cadence?.hours).toBe(14);
    expect(schedule?.cadence?.label).toBe("Every 14 hours");
  });

  it("reports a single daily run as 24 hours", () => {
    const schedule = extractPolicySchedule({
      schedulePolicy: { scheduleRunFrequency: "Daily", scheduleRunTimes: ["2024-01-01T23:00:00Z"] },
    });
    expect(schedule?.cadence?.label).toBe("Every 24 hours");
    expect(schedule?.windowHours).toBeNull();
  });

  it("uses the largest gap between weekly run days", () => {
    const schedule = extractPolicySchedule({
      schedulePolicy: { scheduleRunFrequency: "Weekly", scheduleRunDays: ["Monday", "Wednesday", "Friday"] },
    });
    // Friday → Monday spans three days
    expect(schedule?.cadence?.seconds).toBe(259_200);
    expect(schedule?.cadence?.label).toBe("Every 72 hours");
  });

  it("prefers the log cadence of a database policy and keeps every variant", () => {
    const schedule = extractPolicySchedule({
      properties: {
        workLoadType: "SQLDataBase",
        subProtectionPolicy: [
          { policyType: "Full", schedulePolicy: { scheduleRunFrequency: "Weekly", scheduleRunDays: ["Sunday"], scheduleWindowDuration: "PT6H" } },
          { policyType: "Differential", schedulePolicy: { scheduleRunFrequency: "Daily", scheduleRunTimes: ["2024-01-01T01:00:00Z"] } },
          { policyType: "Log", schedulePolicy: { scheduleFrequencyInMins: 60 } },
        ],
      },
    });
    expect(schedule?.shape).toBe("database");
    expect(schedule?.cadence?.label).toBe("Every 1 hour");
    expect(schedule?.windowHours).toBe(6);
    expect(schedule?.variants.full?.cadence?.hours).toBe(168);
    expect(schedule?.variants.differential?.cadence?.hours).toBe(24);
    expect(schedule?.variants.log?.cadence?.seconds).toBe(3_600);
  });

  it("falls back to the full cadence when no log or differential schedule exists", () => {
    const schedule = extractPolicySchedule({
      subProtectionPolicy: [
        { policyType: "Full", schedulePolicy: { scheduleRunFrequency: "Daily", scheduleRunTimes: ["04:00"] } },
      ],
    });
    expect(schedule?.cadence?.hours).toBe(24);
  });

  it("maps incremental sub-policies onto the differential variant", () => {
    const schedule = extractPolicySchedule({
      subProtectionPolicy: [{ policyType: "Incremental", schedulePolicy: { scheduleRunFrequency: "Daily", scheduleRunTimes: ["04:00"] } }],
    });
    expect(schedule?.variants.differential?.cadence?.hours).toBe(24);
  });

  it("reads the first repeating interval of a rule-based policy", () => {
    const schedule = extractPolicySchedule({
      properties: {
        policyRules: [
          { name: "BackupHourly", trigger: { schedule: { repeatingTimeIntervals: ["R/2024-01-01T02:00:00+00:00/PT4H"] } } },
          { name: "Default", lifecycles: [] },
        ],
      },
    });
    expect(schedule?.shape).toBe("interval");
    expect(schedule?.cadence?.label).toBe("Every 4 hours");
  });

  it("returns null and emits a diagnostic for unknown shapes", () => {
    enableAuditDiagnostics();
    const events: AuditDiagnosticEvent[] = [];
    onAuditDiagnosticEvent((e) => events.push(e));

    expect(extractPolicySchedule({ properties: {} }, { policyId: "/policies/p1" })).toBeNull();
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ type: "backup.shape.unknown", target: "/policies/p1" });
  });
});

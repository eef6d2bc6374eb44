/**
 * Policy shape detection.
 *
 * Field names are matched case-tolerantly, and the first match in
 * `SHAPE_PRECEDENCE` decides the variant.
 */

import type { DatabaseSubPolicy, DatabaseSubPolicyType, PolicyShape, RunFrequency, SimpleSchedule } from "./types.js";
import { firstPresent, getField, getPath, isRecord, readArray, readNumber, readString } from "../shape.js";

const SHAPE_PRECEDENCE = ["subProtectionPolicy", "policyRules", "schedulePolicy"] as const;

const WINDOW_FIELDS: readonly (readonly string[])[] = [
  ["hourlySchedule", "scheduleWindowDuration"],
  ["scheduleWindowDuration"],
  ["windowDuration"],
  ["backupWindowDuration"],
];

function readStrings(value: unknown): string[] {
  return (readArray(value) ?? []).flatMap((entry) => {
    const text = readString(entry);
    return text ? [text] : [];
  });
}

function readFrequency(value: unknown): RunFrequency | null {
  switch (readString(value)?.toLowerCase()) {
    case "hourly":
      return "Hourly";
    case "daily":
      return "Daily";
    case "weekly":
      return "Weekly";
    default:
      return null;
  }
}

function classicSchedule(policy: unknown): SimpleSchedule {
  return {
    frequency: readFrequency(getField(policy, "scheduleRunFrequency")),
    runTimes: readStrings(getField(policy, "scheduleRunTimes")),
    runDays: readStrings(getField(policy, "scheduleRunDays")),
    intervalHours: readNumber(getPath(policy, ["hourlySchedule", "interval"])),
    window: firstPresent(policy, WINDOW_FIELDS),
  };
}

function enhancedSchedule(policy: unknown): SimpleSchedule {
  const frequency = readFrequency(getField(policy, "scheduleRunFrequency"));
  const hourly = getField(policy, "hourlySchedule");
  const daily = getField(policy, "dailySchedule");
  const weekly = getField(policy, "weeklySchedule");

  const runTimes = [
    ...readStrings(getField(daily, "scheduleRunTimes")),
    ...readStrings(getField(weekly, "scheduleRunTimes")),
  ];
  const windowStart = readString(getField(hourly, "scheduleWindowStartTime"));
  if (runTimes.length === 0 && windowStart) runTimes.push(windowStart);

  return {
    frequency: frequency ?? (hourly ? "Hourly" : weekly ? "Weekly" : daily ? "Daily" : null),
    runTimes,
    runDays: readStrings(getField(weekly, "scheduleRunDays")),
    intervalHours: readNumber(getField(hourly, "interval")),
    window: firstPresent(policy, WINDOW_FIELDS),
  };
}

function isEnhanced(schedulePolicy: unknown): boolean {
  const type = readString(getField(schedulePolicy, "schedulePolicyType")) ?? readString(getField(schedulePolicy, "objectType"));
  if (type?.toLowerCase() === "simpleschedulepolicyv2") return true;
  return ["hourlySchedule", "dailySchedule", "weeklySchedule"].some((k) => isRecord(getField(schedulePolicy, k)));
}

function subPolicyType(value: unknown): DatabaseSubPolicyType | null {
  switch (readString(value)?.toLowerCase()) {
    case "full":
      return "full";
    case "differential":
    case "incremental":
      return "differential";
    case "log":
      return "log";
    default:
      return null;
  }
}

function databaseSubPolicies(list: unknown[]): DatabaseSubPolicy[] {
  const result: DatabaseSubPolicy[] = [];
  for (const entry of list) {
    const type = subPolicyType(getField(entry, "policyType"));
    if (!type) continue;
    const schedulePolicy = getField(entry, "schedulePolicy");
    const frequencyMinutes = readNumber(getField(schedulePolicy, "scheduleFrequencyInMins"));
    result.push({
      type,
      frequencyMinutes,
      schedule: frequencyMinutes === null && isRecord(schedulePolicy)
        ? isEnhanced(schedulePolicy) ? enhancedSchedule(schedulePolicy) : classicSchedule(schedulePolicy)
        : null,
    });
  }
  return result;
}

function repeatingIntervals(rules: unknown[]): string[] {
  return rules.flatMap((rule) => readStrings(getPath(rule, ["trigger", "schedule", "repeatingTimeIntervals"])));
}

/**
 * Classify a policy resource (or its `properties` bag) into a shape.
 * Returns null for shapes this module does not understand.
 */
export function classifyPolicy(raw: unknown): PolicyShape | null {
  const properties = isRecord(getField(raw, "properties")) ? getField(raw, "properties") : raw;
  if (!isRecord(properties)) return null;

  for (const field of SHAPE_PRECEDENCE) {
    const value = getField(properties, field);
    if (value === undefined || value === null) continue;

    switch (field) {
      case "subProtectionPolicy": {
        const list = readArray(value);
        if (!list) return null;
        return {
          kind: "database",
          workloadType: readString(getField(properties, "workLoadType")),
          subPolicies: databaseSubPolicies(list),
        };
      }
      case "policyRules": {
        const rules = readArray(value);
        if (!rules) return null;
        return {
          kind: "interval",
          repeatingIntervals: repeatingIntervals(rules),
          window: firstPresent(properties, WINDOW_FIELDS),
        };
      }
      case "schedulePolicy": {
        if (!isRecord(value)) return null;
        if (isEnhanced(value)) return { kind: "vm-enhanced", schedule: enhancedSchedule(value) };
        if (getField(value, "scheduleRunFrequency") !== undefined) {
          return { kind: "vm-classic", schedule: classicSchedule(value) };
        }
        return null;
      }
    }
  }

  return null;
}

import { DateTime } from "luxon";
import { describe, expect, it } from "vitest";
import { createBusinessCalendar } from "./businessCalendar.js";
import { BusinessMoment } from "./businessMoment.js";
import { OutOfRangeError, ValidationError } from "./errors.js";
import { NANOS_PER_HOUR, parseTimeOfDay } from "./timeOfDay.js";

const utc = (iso: string) => BusinessMoment.of(DateTime.fromISO(iso, { zone: "UTC" }));
const local = (date: string, time: string) => BusinessMoment.at({ date, time });

// 2014-12-11 = Thursday, 2014-12-13 = Saturday
describe("BusinessMoment construction", () => {
  it("keeps an instant inside business hours", () => {
    expect(utc("2014-12-12T11:34:56.756").toISO()).toBe("2014-12-12T11:34:56.756+00:00");
  });

  it("snaps after hours to the next day's start", () => {
    expect(utc("2014-12-11T18:34:56.756").toISO()).toBe("2014-12-12T09:00:00.000+00:00");
  });

  it("snaps before hours to the same day's start", () => {
    expect(utc("2014-12-12T05:34:56.756").toISO()).toBe("2014-12-12T09:00:00.000+00:00");
  });

  it("snaps Friday evening to Monday", () => {
    expect(utc("2014-12-12T18:34:56.756").toISO()).toBe("2014-12-15T09:00:00.000+00:00");
  });

  it("snaps the weekend to Monday", () => {
    expect(utc("2014-12-13T14:34:56.756").toISO()).toBe("2014-12-15T09:00:00.000+00:00");
  });

  it("skips holidays", () => {
    const calendar = createBusinessCalendar({ holidays: ["2014-12-10", "2014-12-11"] });
    const moment = BusinessMoment.of(DateTime.fromISO("2014-12-10T14:34:56.756", { zone: "UTC" }), calendar);
    expect(moment.toISO()).toBe("2014-12-12T09:00:00.000+00:00");
  });

  it("keeps the offset of an ISO string", () => {
    const moment = BusinessMoment.of("2014-12-12T11:34:56.756+02:00");
    expect(moment.toISO()).toBe("2014-12-12T11:34:56.756+02:00");
    expect(moment.zone).toBe("UTC+2");
  });

  it("rejects invalid instants and zones", () => {
    expect(() => BusinessMoment.of("not a date")).toThrow(ValidationError);
    expect(() => BusinessMoment.of(new Date(Number.NaN))).toThrow(ValidationError);
    expect(() => BusinessMoment.at({ date: "2014-12-11", time: "12:00", zone: "Mars/Olympus" })).toThrow(
      ValidationError
    );
    expect(() => BusinessMoment.of("2014-12-12T11:34:56.756Z", undefined, 1_000_000)).toThrow(ValidationError);
  });

  it("exposes nanosecond fields", () => {
    const moment = local("2014-12-11", "12:34:56.123456789");
    expect(moment.date).toBe("2014-12-11");
    expect(moment.weekday).toBe(4);
    expect([moment.hour, moment.minute, moment.second, moment.millisecond]).toEqual([12, 34, 56, 123]);
    expect(moment.nanosecond).toBe(123_456_789);
    expect(moment.nanoOfMillisecond).toBe(456_789);
    expect(moment.offsetOfDay).toBe(parseTimeOfDay("12:34:56.123456789"));
  });
});

describe("BusinessMoment sub-day moves", () => {
  it("nanoseconds across the night", () => {
    expect(local("2014-12-11", "16:59:59.999999999").plus(3, "nanoseconds").toISO()).toBe(
      "2014-12-12T09:00:00.000000002+00:00"
    );
    expect(local("2014-12-11", "16:59:59.999999997").plus(3, "nanoseconds").toISO()).toBe(
      "2014-12-11T17:00:00.000+00:00"
    );
    expect(local("2014-12-12", "09:00:00.000000002").minus(3, "nanoseconds").toISO()).toBe(
      "2014-12-11T16:59:59.999999999+00:00"
    );
    expect(local("2014-12-12", "09:00:00.000000003").minus(3, "nanoseconds").toISO()).toBe(
      "2014-12-12T09:00:00.000+00:00"
    );
  });

  it("milliseconds across the night", () => {
    expect(utc("2014-12-11T16:59:59.999").plus(3, "milliseconds").toISO()).toBe("2014-12-12T09:00:00.002+00:00");
    expect(utc("2014-12-11T16:59:59.997").plus(3, "milliseconds").toISO()).toBe("2014-12-11T17:00:00.000+00:00");
    expect(utc("2014-12-12T09:00:00.002").minus(3, "milliseconds").toISO()).toBe("2014-12-11T16:59:59.999+00:00");
    expect(utc("2014-12-12T09:00:00.003").minus(3, "milliseconds").toISO()).toBe("2014-12-12T09:00:00.000+00:00");
  });

  it("seconds, minutes and hours across the night", () => {
    const start = utc("2014-12-11T16:59:59.999");
    expect(start.plus(3, "seconds").toISO()).toBe("2014-12-12T09:00:02.999+00:00");
    expect(start.plus(3, "minutes").toISO()).toBe("2014-12-12T09:02:59.999+00:00");
    expect(start.plus(3, "hours").toISO()).toBe("2014-12-12T11:59:59.999+00:00");
    expect(utc("2014-12-12T11:00").minus(3, "hours").toISO()).toBe("2014-12-11T16:00:00.000+00:00");
  });

  it("inside the day", () => {
    const noon = utc("2014-12-11T12:00");
    expect(noon.plus(3, "microseconds").toISO()).toBe("2014-12-11T12:00:00.000003000+00:00");
    expect(noon.minus(3, "seconds").toISO()).toBe("2014-12-11T11:59:57.000+00:00");
  });

  it("from the weekend", () => {
    // 2017-06-24 = Saturday
    const saturday = utc("2017-06-24T00:00");
    expect(saturday.plus(35, "minutes").toISO()).toBe("2017-06-26T09:35:00.000+00:00");
    expect(saturday.plus(515, "minutes").toISO()).toBe("2017-06-27T09:35:00.000+00:00");
    expect(saturday.minus(35, "minutes").toISO()).toBe("2017-06-23T16:25:00.000+00:00");
    expect(saturday.minus(515, "minutes").toISO()).toBe("2017-06-22T16:25:00.000+00:00");
  });

  it("follows local wall time across a DST change", () => {
    // 2024-03-08 = Friday; New York moves to EDT on Sunday 2024-03-10
    const friday = BusinessMoment.at({ date: "2024-03-08", time: "16:30", zone: "America/New_York" });
    expect(friday.toISO()).toBe("2024-03-08T16:30:00.000-05:00");
    expect(friday.plus(1, "hours").toISO()).toBe("2024-03-11T09:30:00.000-04:00");
  });

  it("returns the same moment for a zero move", () => {
    const moment = utc("2014-12-11T12:00");
    expect(moment.plus(0, "hours")).toBe(moment);
    expect(moment.minus(0n, "nanoseconds")).toBe(moment);
  });

  it("is reversed by the opposite move", () => {
    const moment = local("2014-12-11", "10:15:30.000000250");
    expect(moment.plus(45, "hours").minus(45, "hours").equals(moment)).toBe(true);
    expect(moment.minus(7_000_000_123n, "nanoseconds").plus(7_000_000_123n, "nanoseconds").equals(moment)).toBe(true);
  });

  it("rejects fractional amounts and overflowing moves", () => {
    const moment = utc("2014-12-11T12:00");
    expect(() => moment.plus(1.5, "hours")).toThrow(ValidationError);
    expect(() => moment.plus(2n ** 62n, "hours")).toThrow(OutOfRangeError);
  });
});

describe("BusinessMoment day and calendar moves", () => {
  it("a day is one business day", () => {
    expect(utc("2014-12-08T12:00").plus(3, "days").toISO()).toBe("2014-12-11T12:00:00.000+00:00");
    expect(utc("2014-12-11T12:00").plus(3, "days").toISO()).toBe("2014-12-16T12:00:00.000+00:00");
    expect(utc("2014-12-16T12:00").minus(3, "days").toISO()).toBe("2014-12-11T12:00:00.000+00:00");
    expect(utc("2014-12-11T12:00").minus(3, "days").toISO()).toBe("2014-12-08T12:00:00.000+00:00");
  });

  it("weeks, quarters and years are calendar moves", () => {
    const thursday = utc("2014-12-11T12:00");
    expect(thursday.plus(1, "weeks").toISO()).toBe("2014-12-18T12:00:00.000+00:00");
    expect(thursday.plus(1, "quarters").toISO()).toBe("2015-03-11T12:00:00.000+00:00");
    expect(thursday.plus(1, "years").toISO()).toBe("2015-12-11T12:00:00.000+00:00");
  });

  it("snaps a calendar move that lands on a weekend", () => {
    // 2015-01-11 = Sunday
    expect(utc("2014-12-11T12:00").plus(1, "months").toISO()).toBe("2015-01-12T09:00:00.000+00:00");
  });

  it("snaps after setting fields", () => {
    expect(utc("2014-12-11T12:00").set({ day: 13 }).toISO()).toBe("2014-12-15T09:00:00.000+00:00");
  });
});

describe("BusinessMoment zones", () => {
  it("re-snaps in the new zone for the same instant", () => {
    const moment = utc("2014-12-11T10:00").withZoneSameInstant("America/New_York");
    expect(moment.toISO()).toBe("2014-12-11T09:00:00.000-05:00");
    expect(moment.zone).toBe("America/New_York");
  });

  it("keeps wall time when changing zone locally", () => {
    expect(utc("2014-12-11T12:00").withZoneSameLocal("Europe/Paris").toISO()).toBe("2014-12-11T12:00:00.000+01:00");
  });
});

describe("BusinessMoment DST overlap", () => {
  // New York falls back on Sunday 2024-11-03: 01:30 happens at -04:00 and again at -05:00
  const allWeek = createBusinessCalendar({ dayStart: "00:00", dayEnd: "23:00", workdays: [1, 2, 3, 4, 5, 6, 7] });
  const ambiguous = BusinessMoment.at({ date: "2024-11-03", time: "01:30", zone: "America/New_York" }, allWeek);

  it("picks either offset for the same wall time", () => {
    expect(ambiguous.withEarlierOffsetAtOverlap().toISO()).toBe("2024-11-03T01:30:00.000-04:00");
    expect(ambiguous.withLaterOffsetAtOverlap().toISO()).toBe("2024-11-03T01:30:00.000-05:00");
    expect(ambiguous.withLaterOffsetAtOverlap().withEarlierOffsetAtOverlap().toISO()).toBe(
      "2024-11-03T01:30:00.000-04:00"
    );
  });

  it("keeps the moment outside an overlap", () => {
    const moment = utc("2014-12-11T12:00");
    expect(moment.withEarlierOffsetAtOverlap()).toBe(moment);
    expect(moment.withLaterOffsetAtOverlap()).toBe(moment);
  });
});

describe("BusinessMoment comparison", () => {
  it("orders by instant then sub-millisecond nanos", () => {
    const a = local("2014-12-11", "12:00:00.000000001");
    const b = local("2014-12-11", "12:00:00.000000002");
    const c = local("2014-12-11", "12:00:01");
    expect(a.compare(b)).toBe(-1);
    expect(c.compare(a)).toBe(1);
    expect(a.compare(local("2014-12-11", "12:00:00.000000001"))).toBe(0);
  });

  it("equals needs the same window and zone", () => {
    const moment = local("2014-12-11", "12:00");
    expect(moment.equals(utc("2014-12-11T12:00"))).toBe(true);
    const withHoliday = BusinessMoment.at(
      { date: "2014-12-11", time: "12:00" },
      createBusinessCalendar({ holidays: ["2014-12-25"] })
    );
    expect(moment.equals(withHoliday)).toBe(false);
    expect(moment.equals(moment.withZoneSameInstant("Europe/London"))).toBe(false);
  });

  it("counts whole calendar units between moments", () => {
    expect(utc("2014-12-11T12:00").until(utc("2014-12-16T12:00"), "days")).toBe(5);
    expect(utc("2014-12-16T12:00").until(utc("2014-12-11T12:00"), "days")).toBe(-5);
  });

  it("measures business time between moments", () => {
    expect(utc("2014-12-11T12:00").businessDurationUntil(utc("2014-12-12T10:00"))).toBe(6n * NANOS_PER_HOUR);
    const paris = utc("2014-12-11T12:00").withZoneSameLocal("Europe/Paris");
    expect(() => utc("2014-12-11T12:00").businessDurationUntil(paris)).toThrow(ValidationError);
  });
});

describe("BusinessMoment output", () => {
  it("serializes to ISO in JSON", () => {
    expect(JSON.stringify({ at: utc("2014-12-12T11:34:56.756") })).toBe('{"at":"2014-12-12T11:34:56.756+00:00"}');
  });

  it("converts to epoch millis", () => {
    const moment = utc("2014-12-12T11:34:56.756");
    expect(moment.toMillis()).toBe(Date.UTC(2014, 11, 12, 11, 34, 56, 756));
    expect(moment.toJSDate().getTime()).toBe(moment.toMillis());
  });
});

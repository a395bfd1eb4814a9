import { dateWindow, formatIsoDate, parseIsoDate, toArchiveDateCode, windowDays } from "./dates.js";

describe("parseIsoDate", () => {
  it("parses a YYYY-MM-DD date at local midnight", () => {
    const date = parseIsoDate("2025-04-11");
    expect(date).not.toBeNull();
    expect(date?.getFullYear()).toBe(2025);
    expect(date?.getMonth()).toBe(3);
    expect(date?.getDate()).toBe(11);
    expect(date?.getHours()).toBe(0);
  });

  it.each(["20250411", "2025-4-11", "11-04-2025", "2025-02-30", "2025-13-01", "", "not a date"])(
    "rejects %p",
    (value) => {
      expect(parseIsoDate(value)).toBeNull();
    }
  );
});

describe("archive date codes", () => {
  it("zero-pads to eight digits", () => {
    expect(toArchiveDateCode(new Date(2025, 0, 5))).toBe("20250105");
  });
});

describe("dateWindow", () => {
  it("spans ndays calendar days ending on the given date", () => {
    expect(dateWindow(new Date(2025, 3, 11), 3)).toEqual({ start: "2025-04-09", end: "2025-04-11" });
  });

  it("collapses to one day when ndays is 1", () => {
    expect(dateWindow(new Date(2025, 3, 11), 1)).toEqual({ start: "2025-04-11", end: "2025-04-11" });
  });
});

describe("windowDays", () => {
  it("lists every day oldest first across a month boundary", () => {
    expect(windowDays(new Date(2025, 2, 2), 4).map(formatIsoDate)).toEqual([
      "2025-02-27",
      "2025-02-28",
      "2025-03-01",
      "2025-03-02",
    ]);
  });
});

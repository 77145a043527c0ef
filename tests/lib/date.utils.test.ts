import { formatDateKey, formatTimestamp, parseTimestamp, truncateToSeconds } from "@/lib/utils/date";

describe("date utils", () => {
  test("formatTimestamp pads every part", () => {
    expect(formatTimestamp(new Date(2025, 2, 4, 9, 5, 7))).toBe("04/03/2025 09:05:07");
  });

  test("parseTimestamp reads local time", () => {
    expect(parseTimestamp(" 14/03/2025 09:05:30 ")).toEqual(new Date(2025, 2, 14, 9, 5, 30));
  });

  test.each([
    ["2025-03-14 09:05:30", "Formato de fecha inválido (dd/MM/yyyy HH:mm:ss)"],
    ["14/13/2025 09:05:30", "Mes inválido"],
    ["00/03/2025 09:05:30", "Día inválido"],
    ["31/02/2025 09:05:30", "Fecha inválida"],
    ["14/03/2025 24:00:00", "Hora inválida"],
  ])("parseTimestamp rejects %s", (value, message) => {
    expect(() => parseTimestamp(value)).toThrow(message);
  });

  test("truncateToSeconds drops milliseconds", () => {
    expect(truncateToSeconds(new Date(2025, 2, 14, 9, 5, 30, 999))).toEqual(new Date(2025, 2, 14, 9, 5, 30));
    expect(truncateToSeconds(new Date(-1500)).getTime()).toBe(-2000);
  });

  test("formatTimestamp rejects an invalid date", () => {
    expect(() => formatTimestamp(new Date(Number.NaN))).toThrow("Fecha inválida");
  });

  test("parseTimestamp keeps years below 100 as written", () => {
    const parsed = parseTimestamp("05/06/0099 10:00:00");

    expect(parsed.getFullYear()).toBe(99);
    expect(formatTimestamp(parsed)).toBe("05/06/0099 10:00:00");
  });

  test("parseTimestamp checks leap days against the year as written", () => {
    expect(formatTimestamp(parseTimestamp("29/02/0000 12:00:00"))).toBe("29/02/0000 12:00:00");
    expect(() => parseTimestamp("29/02/0100 12:00:00")).toThrow("Fecha inválida");
  });

  test("formatDateKey gives yyyyMMdd", () => {
    expect(formatDateKey(new Date(2025, 2, 4, 23, 59))).toBe("20250304");
  });
});

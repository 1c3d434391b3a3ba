import { describe, expect, it } from "vitest";
import { PipeLineParser } from "./pipe.js";

const parser = new PipeLineParser();

describe("PipeLineParser", () => {
  it("recognises bus monitor lines with a group address in the fourth column", () => {
    expect(parser.matches("2024-05-01 10:00:00.123 | 1.1.5 | Sensor A | 1/2/3 | Temp | 21.5")).toBe(true);
    expect(parser.matches("2024-05-01 10:00:00.123 | 1.1.5 | Sensor A | Temp | 21.5")).toBe(false);
    expect(parser.matches("2024-05-01;1.1.5;Sensor A;x;1/2/3")).toBe(false);
  });

  it("reads timestamp, source, destination and payload columns", () => {
    const line = "2024-05-01 10:00:00.123 | 1.1.5     |Sensor A                      | 1/2/3    | Temp                              | 21.5";
    expect(parser.parse(line)).toEqual({
      timestamp: "2024-05-01 10:00:00.123",
      sourceKey: "1.1.5",
      destKey: "1/2/3",
      payload: "21.5",
    });
  });

  it("treats a missing payload column as absent", () => {
    expect(parser.parse("2024-05-01 10:00:01 | 1.1.6 | Switch | 1/1/1 | Light")).toEqual({
      timestamp: "2024-05-01 10:00:01",
      sourceKey: "1.1.6",
      destKey: "1/1/1",
      payload: null,
    });
  });

  it("fills an empty source with N/A and rejects non-address destinations", () => {
    expect(parser.parse("2024-05-01 10:00:02 |  | x | 2/0/1 | y | on")?.sourceKey).toBe("N/A");
    expect(parser.parse("2024-05-01 10:00:02 | 1.1.1 | x | kitchen | y | on")).toBeNull();
    expect(parser.parse("2024-05-01 10:00:02 | 1.1.1 | x")).toBeNull();
  });
});

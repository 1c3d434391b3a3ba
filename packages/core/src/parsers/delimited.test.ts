import { describe, expect, it } from "vitest";
import { splitDelimited } from "./common.js";
import { DelimitedLineParser } from "./delimited.js";

const parser = new DelimitedLineParser();

describe("DelimitedLineParser", () => {
  it("splits quoted fields and unescapes doubled quotes", () => {
    expect(splitDelimited('a;"b;c";"say ""hi""";', ";")).toEqual(["a", "b;c", 'say "hi"', ""]);
  });

  it("reads columns 0, 1, 4 and 6", () => {
    expect(parser.parse('2024-05-01 10:00:00;1.1.5;Sensor A;Write;1/2/3;Temp;"21,5 °C"')).toEqual({
      timestamp: "2024-05-01 10:00:00",
      sourceKey: "1.1.5",
      destKey: "1/2/3",
      payload: "21,5 °C",
    });
  });

  it("needs at least five columns and a group address destination", () => {
    expect(parser.parse("2024-05-01 10:00:00;1.1.5;Sensor A;Write")).toBeNull();
    expect(parser.parse("2024-05-01 10:00:00;1.1.5;Sensor A;Write;Temp")).toBeNull();
    expect(parser.parse("2024-05-01 10:00:00;1.1.5;Sensor A;Write;4/0/1")).toEqual({
      timestamp: "2024-05-01 10:00:00",
      sourceKey: "1.1.5",
      destKey: "4/0/1",
      payload: null,
    });
  });
});

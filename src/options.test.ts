import { describe, expect, test } from "vitest";

import { CliOptionsError, parseCliOptions } from "./options";

describe("parseCliOptions", () => {
  test("fills defaults", () => {
    expect(parseCliOptions({})).toEqual({
      output: ".",
      plan: false,
      nested: "first-child",
      zip: true,
      indexPadding: 2,
      maxNameLength: 100,
    });
  });

  test("coerces numeric strings from the command line", () => {
    const opts = parseCliOptions({
      output: "out",
      chapters: "table.json",
      nested: "full",
      zip: false,
      indexPadding: "3",
      maxNameLength: "40",
    });
    expect(opts).toMatchObject({
      output: "out",
      chapters: "table.json",
      nested: "full",
      zip: false,
      indexPadding: 3,
      maxNameLength: 40,
    });
  });

  test("rejects an unknown nesting policy", () => {
    expect(() => parseCliOptions({ nested: "deep" })).toThrow(CliOptionsError);
  });

  test("names the offending option", () => {
    expect(() => parseCliOptions({ indexPadding: "0" })).toThrow(
      /--indexPadding/,
    );
  });
});

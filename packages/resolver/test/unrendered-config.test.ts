import { test, describe, expect } from "vitest";

import { MemoryParseCache, extractUnrenderedConfig } from "../src/index.js";
import { countingParser } from "./_helpers/templates.js";

describe("extractUnrenderedConfig", () => {
  test("text without config( is not parsed", () => {
    const parser = countingParser();
    expect(extractUnrenderedConfig("select 1", { parser })).toBeNull();
    expect(parser.calls).toBe(0);
  });

  test("only the first config call is read", () => {
    const text = "{{ config(materialized='table', tags=['a']) }}{{ config(schema='other') }}select 1";
    expect(extractUnrenderedConfig(text)).toEqual({ materialized: "'table'", tags: "['a']" });
  });

  test("values are kept unevaluated", () => {
    const text = "{{ config(alias=env_var('ALIAS', 'fallback'), enabled=target.name != 'ci') }}";
    expect(extractUnrenderedConfig(text)).toEqual({
      alias: "env_var('ALIAS', 'fallback')",
      enabled: "target.name != 'ci'",
    });
  });

  test("config( inside a comment parses but finds nothing", () => {
    const parser = countingParser();
    expect(extractUnrenderedConfig("{# config( #}select 1", { parser })).toBeNull();
    expect(parser.calls).toBe(1);
  });

  test("large integers are kept exactly", () => {
    expect(extractUnrenderedConfig("{{ config(batch=9007199254740993) }}")).toEqual({ batch: "9007199254740993" });
    expect(extractUnrenderedConfig("{{ config(batch=9007199254740992) }}")).toEqual({ batch: "9007199254740992" });
    expect(extractUnrenderedConfig("{{ config(batch=1000000000000000000000) }}")).toEqual({
      batch: "1000000000000000000000",
    });
  });

  test("other calls ending in config are ignored", () => {
    expect(extractUnrenderedConfig("{{ my_config(x=1) }}")).toBeNull();
  });

  test("a config call without keywords is empty", () => {
    expect(extractUnrenderedConfig("{{ config() }}")).toEqual({});
  });

  test("shares the parse cache", () => {
    const cache = new MemoryParseCache();
    const parser = countingParser();
    const text = "{{ config(materialized='view') }}";

    extractUnrenderedConfig(text, { cache, parser });
    extractUnrenderedConfig(text, { cache, parser });

    expect(parser.calls).toBe(1);
  });
});

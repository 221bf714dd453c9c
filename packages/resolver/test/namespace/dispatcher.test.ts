import { test, describe, expect } from "vitest";

import {
  CompilationError,
  MacroDispatcher,
  MacroNamespaceBuilder,
  resolveMacroCalls,
  type DispatchConfig,
} from "../../src/index.js";
import { macro, projectMacros } from "../_helpers/macros.js";

const namespace = new MacroNamespaceBuilder("proj", "proj", ["dbt_postgres", "dbt"])
  .addMacros([...projectMacros, macro("pkg_a", "default__bar"), macro("proj", "postgres__bar")])
  .buildNamespace();

function dispatcher(config: Partial<DispatchConfig> = {}): MacroDispatcher {
  return new MacroDispatcher(namespace, {
    projectName: "proj",
    dependencies: ["pkg_a", "pkg_b"],
    adapterTypes: ["redshift", "postgres"],
    ...config,
  });
}

describe("MacroDispatcher.searchPackages", () => {
  test("no namespace searches everything", () => {
    expect(dispatcher().searchPackages(null)).toEqual([null]);
  });

  test("an installed package is searched after the root project", () => {
    expect(dispatcher().searchPackages("pkg_a")).toEqual(["proj", "pkg_a"]);
  });

  test("a configured search order wins", () => {
    const d = dispatcher({ dispatch: [{ macroNamespace: "pkg_a", searchOrder: ["pkg_b", "pkg_a"] }] });
    expect(d.searchPackages("pkg_a")).toEqual(["pkg_b", "pkg_a"]);
  });

  test("an empty configured search order is ignored", () => {
    const d = dispatcher({ dispatch: [{ macroNamespace: "pkg_a", searchOrder: [] }] });
    expect(d.searchPackages("pkg_a")).toEqual(["proj", "pkg_a"]);
  });

  test("an unknown namespace searches everything", () => {
    expect(dispatcher().searchPackages("elsewhere")).toEqual([null]);
  });
});

describe("MacroDispatcher.dispatch", () => {
  test("the most specific adapter implementation is chosen", () => {
    expect(dispatcher().dispatch("foo")).toEqual(macro("dbt_postgres", "postgres__foo"));
  });

  test("falls back to the default implementation", () => {
    expect(dispatcher({ adapterTypes: ["snowflake"] }).dispatch("foo")).toEqual(macro("dbt", "default__foo"));
  });

  test("the root project can override a package's implementation", () => {
    expect(dispatcher().dispatch("bar", "pkg_a")).toEqual(macro("proj", "postgres__bar"));
  });

  test("packages in a search order that are not installed are skipped", () => {
    const d = dispatcher({ dispatch: [{ macroNamespace: "pkg_a", searchOrder: ["not_installed", "pkg_a"] }] });
    expect(d.dispatch("bar", "pkg_a")).toEqual(macro("pkg_a", "default__bar"));
  });

  test("lists every name tried when nothing matches", () => {
    expect(() => dispatcher({ adapterTypes: ["postgres"] }).dispatch("nothing")).toThrow(
      "In dispatch: No macro named 'nothing' found within namespace: 'None'\n" +
        "    Searched for: 'postgres__nothing', 'default__nothing'",
    );
    expect(() => dispatcher({ adapterTypes: ["postgres"] }).dispatch("nothing", "pkg_a")).toThrow(
      "In dispatch: No macro named 'nothing' found within namespace: 'pkg_a'\n" +
        "    Searched for: 'proj.postgres__nothing', 'proj.default__nothing', " +
        "'pkg_a.postgres__nothing', 'pkg_a.default__nothing'",
    );
  });

  test("dotted macro names are rejected with a suggestion", () => {
    expect(() => dispatcher().dispatch("pkg_a.bar")).toThrow(CompilationError);
    expect(() => dispatcher().dispatch("pkg_a.bar")).toThrow(
      'use: adapter.dispatch("bar", macro_namespace="pkg_a")',
    );
  });
});

describe("as the namespace lookup of resolveMacroCalls", () => {
  test("the dispatched implementation is reported", () => {
    const calls = resolveMacroCalls("{{ adapter.dispatch('foo', 'dbt')() }}", new Set(), {
      namespaceLookup: dispatcher(),
    });
    expect(calls.map((c) => c.name)).toEqual(["foo", "dbt_postgres.postgres__foo"]);
  });

  test("a failed dispatch fails the template", () => {
    expect(() =>
      resolveMacroCalls("{{ adapter.dispatch('nothing')() }}", new Set(), { namespaceLookup: dispatcher() }),
    ).toThrow(CompilationError);
  });
});

import { test, describe, expect } from "vitest";

import {
  MacroNameNotStringError,
  MacroNamespaceNotStringError,
  parseDispatchInvocation,
  resolveDispatch,
  resolveMacroCalls,
  tryResolveDispatch,
  type NamespaceLookup,
} from "../src/index.js";
import { firstCall } from "./_helpers/templates.js";

function dispatchNames(text: string, lookup: NamespaceLookup | null = null): string[] {
  return resolveDispatch(firstCall(text), lookup).map((c) => c.name);
}

function recordingLookup(packageName: string): NamespaceLookup & { calls: [string, string | null | undefined][] } {
  const calls: [string, string | null | undefined][] = [];
  return {
    calls,
    dispatch(macroName, macroNamespace) {
      calls.push([macroName, macroNamespace]);
      return { packageName, name: `postgres__${macroName}` };
    },
  };
}

describe("adapter.dispatch without a namespace lookup", () => {
  test("an explicit namespace gives one qualified candidate", () => {
    const names = dispatchNames("{{ adapter.dispatch('foo', macro_namespace='pkg_a') }}");
    expect(names.filter((n) => n === "pkg_a.foo")).toHaveLength(1);
    expect(names).toEqual(["foo", "pkg_a.foo"]);
  });

  test("a package list gives one candidate per package, in order", () => {
    expect(dispatchNames("{{ adapter.dispatch('foo', ['pkg_a', 'pkg_b']) }}")).toEqual([
      "foo",
      "pkg_a.foo",
      "pkg_b.foo",
    ]);
  });

  test("a positional namespace overrides the keyword", () => {
    expect(dispatchNames("{{ adapter.dispatch('foo', 'pkg_b', macro_namespace='pkg_a') }}")).toEqual([
      "foo",
      "pkg_b.foo",
    ]);
  });

  test("macro_name keyword", () => {
    expect(dispatchNames("{{ adapter.dispatch(macro_name='foo', macro_namespace='pkg_a') }}")).toEqual([
      "foo",
      "pkg_a.foo",
    ]);
  });

  test("positional and keyword names are both candidates, duplicates kept", () => {
    expect(dispatchNames("{{ adapter.dispatch('foo', macro_name='bar') }}")).toEqual(["foo", "bar"]);
    expect(dispatchNames("{{ adapter.dispatch('foo', macro_name='foo') }}")).toEqual(["foo", "foo"]);
  });

  test("a non-literal macro name gives no candidates", () => {
    expect(dispatchNames("{{ adapter.dispatch(name_var, ['pkg_a']) }}")).toEqual([]);
  });

  test("candidates are typed from the dispatch call's arguments", () => {
    const [call] = resolveDispatch(firstCall("{{ adapter.dispatch('foo', 'pkg') }}"));
    expect(call?.positionalArgTypes).toEqual(["string", "string"]);
  });

  test("parsed invocation", () => {
    expect(parseDispatchInvocation(firstCall("{{ adapter.dispatch('foo', ['a', 'b']) }}"))).toEqual({
      macroName: "foo",
      macroNamespace: null,
      packages: ["a", "b"],
    });
  });
});

describe("invalid dispatch arguments", () => {
  test("non-literal macro_name", () => {
    const call = firstCall("{{ adapter.dispatch(macro_name=get_name()) }}");
    expect(() => resolveDispatch(call)).toThrow(MacroNameNotStringError);
    expect(() => resolveDispatch(call)).toThrow(
      "The macro_name parameter (get_name()) to adapter.dispatch was not a string",
    );
  });

  test("non-literal macro_namespace", () => {
    const call = firstCall("{{ adapter.dispatch('foo', macro_namespace=get_ns()) }}");
    expect(() => resolveDispatch(call)).toThrow(MacroNamespaceNotStringError);
    expect(() => resolveDispatch(call)).toThrow("The macro_namespace parameter to adapter.dispatch is a Call, not a string");
  });

  test("the tagged form returns the error instead of throwing", () => {
    const resolution = tryResolveDispatch(firstCall("{{ adapter.dispatch(macro_name=1) }}"));
    expect(resolution.kind).toBe("error");
    expect(resolution.kind === "error" && resolution.error).toBeInstanceOf(MacroNameNotStringError);
  });

  test("through resolveMacroCalls", () => {
    expect(() => resolveMacroCalls("{{ adapter.dispatch('foo', macro_namespace=ns) }}", new Set())).toThrow(
      MacroNamespaceNotStringError,
    );
  });
});

describe("adapter.dispatch with a namespace lookup", () => {
  test("the selected implementation is the only qualified candidate", () => {
    const lookup = recordingLookup("dbt_postgres");
    expect(dispatchNames("{{ adapter.dispatch('foo', macro_namespace='pkg_a') }}", lookup)).toEqual([
      "foo",
      "dbt_postgres.postgres__foo",
    ]);
    expect(lookup.calls).toEqual([["foo", "pkg_a"]]);
  });

  test("without a namespace the lookup gets null", () => {
    const lookup = recordingLookup("dbt");
    dispatchNames("{{ adapter.dispatch('foo', ['ignored']) }}", lookup);
    expect(lookup.calls).toEqual([["foo", null]]);
  });

  test("no lookup is made when the macro name is unknown", () => {
    const lookup = recordingLookup("dbt");
    expect(dispatchNames("{{ adapter.dispatch(name_var) }}", lookup)).toEqual([]);
    expect(lookup.calls).toEqual([]);
  });

  test("empty names and namespaces are ignored", () => {
    const lookup = recordingLookup("dbt");
    expect(dispatchNames("{{ adapter.dispatch(macro_name='') }}", lookup)).toEqual([]);
    expect(lookup.calls).toEqual([]);

    expect(dispatchNames("{{ adapter.dispatch('foo', '') }}")).toEqual(["foo"]);
    expect(dispatchNames("{{ adapter.dispatch('foo', macro_namespace='') }}")).toEqual(["foo"]);
    expect(dispatchNames("{{ adapter.dispatch('foo', ['', 'p']) }}")).toEqual(["foo", "p.foo"]);
  });

  test("resolveMacroCalls passes the lookup through", () => {
    const lookup = recordingLookup("dbt_postgres");
    const calls = resolveMacroCalls("{{ adapter.dispatch('foo')() }}", new Set(), { namespaceLookup: lookup });
    expect(calls.map((c) => c.name)).toEqual(["foo", "dbt_postgres.postgres__foo"]);
    expect(lookup.calls).toHaveLength(1);
  });
});

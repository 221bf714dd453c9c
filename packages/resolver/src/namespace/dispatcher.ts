import { debug } from "@macro-deps/shared";

import { CompilationError, PackageNotFoundForMacroError } from "../errors.js";
import type { NamespaceLookup } from "../types.js";
import type { MacroDefinition, MacroNamespace } from "./macro-namespace.js";

/** A project-level `dispatch:` entry: where to look for a namespace's macros. */
export interface DispatchSearchOrder {
  macroNamespace: string;
  searchOrder: readonly string[];
}

export interface DispatchConfig {
  /** Root project name. */
  projectName: string;
  /** Names of installed packages. */
  dependencies: readonly string[];
  dispatch?: readonly DispatchSearchOrder[];
  /** The active adapter type followed by the types it inherits from, e.g. `["redshift", "postgres"]`. */
  adapterTypes: readonly string[];
}

/**
 * Picks the implementation `adapter.dispatch` renders: for each package in
 * the search path, tries `<adapter>__<name>` for the adapter and its parents,
 * then `default__<name>`.
 */
export class MacroDispatcher implements NamespaceLookup {
  constructor(
    private readonly namespace: MacroNamespace,
    private readonly config: DispatchConfig,
  ) {}

  private macroPrefixes(): string[] {
    return [...this.config.adapterTypes, "default"];
  }

  /** Packages to search, where `null` means the whole namespace. */
  searchPackages(macroNamespace: string | null): (string | null)[] {
    if (macroNamespace === null) return [null];

    const configured = this.config.dispatch?.find((d) => d.macroNamespace === macroNamespace);
    if (configured && configured.searchOrder.length > 0) {
      return [...configured.searchOrder];
    }
    if (this.config.dependencies.includes(macroNamespace)) {
      return [this.config.projectName, macroNamespace];
    }
    return [null];
  }

  dispatch(macroName: string, macroNamespace: string | null = null): MacroDefinition {
    if (macroName.includes(".")) {
      const dot = macroName.indexOf(".");
      const suggestedNamespace = macroName.slice(0, dot);
      const suggestedName = macroName.slice(dot + 1);
      throw new CompilationError(
        `In adapter.dispatch, got a macro_name argument, "${macroName}", but macro_name should not contain dots. ` +
          `If you meant to call a macro in the "${suggestedNamespace}" namespace, use: ` +
          `adapter.dispatch("${suggestedName}", macro_namespace="${suggestedNamespace}")`,
      );
    }

    const attempts: string[] = [];
    for (const packageName of this.searchPackages(macroNamespace)) {
      for (const prefix of this.macroPrefixes()) {
        const searchName = `${prefix}__${macroName}`;
        const macro = this.lookup(packageName, searchName);
        attempts.push(packageName === null ? searchName : `${packageName}.${searchName}`);
        if (macro) {
          debug.dispatch("dispatched", { macroName, macroNamespace, packageName: macro.packageName, name: macro.name });
          return macro;
        }
      }
    }

    const searched = attempts.map((a) => `'${a}'`).join(", ");
    throw new CompilationError(
      `In dispatch: No macro named '${macroName}' found within namespace: '${macroNamespace ?? "None"}'\n` +
        `    Searched for: ${searched}`,
    );
  }

  private lookup(packageName: string | null, name: string): MacroDefinition | undefined {
    try {
      return this.namespace.getFromPackage(packageName, name);
    } catch (err) {
      // Search orders may name packages that aren't installed.
      if (err instanceof PackageNotFoundForMacroError) return undefined;
      throw err;
    }
  }
}

import { DuplicateMacroInPackageError, PackageNotFoundForMacroError } from "../errors.js";

/** Name under which the merged internal packages are reachable. */
export const GLOBAL_PROJECT_NAME = "dbt";

/** A macro known to the project. */
export interface MacroDefinition {
  packageName: string;
  name: string;
  /** Full source of the `{% macro %}` block. */
  macroSql: string;
  /** Project-relative file the macro was defined in. */
  path?: string;
}

export type MacroTable = ReadonlyMap<string, MacroDefinition>;

/** What a name resolves to: a macro, or a package's table of macros. */
export type NamespaceEntry = MacroDefinition | MacroTable;

export function isMacroTable(entry: NamespaceEntry): entry is MacroTable {
  return entry instanceof Map;
}

/**
 * Read-only view of the macros visible from one package.
 *
 * Names resolve in order: the search package's own macros, the root
 * project's, package names (to their macro tables), the global project name,
 * then the global project's macros.
 */
export class MacroNamespace {
  readonly #locals: MacroTable;
  readonly #globals: MacroTable;
  readonly #packages: ReadonlyMap<string, MacroTable>;
  readonly #globalProject: MacroTable;

  constructor(init: {
    locals: MacroTable;
    globals: MacroTable;
    packages: ReadonlyMap<string, MacroTable>;
    globalProject: MacroTable;
  }) {
    this.#locals = init.locals;
    this.#globals = init.globals;
    this.#packages = init.packages;
    this.#globalProject = init.globalProject;
  }

  *#searchOrder(): Generator<ReadonlyMap<string, NamespaceEntry>> {
    yield this.#locals;
    yield this.#globals;
    yield this.#packages;
    yield new Map([[GLOBAL_PROJECT_NAME, this.#globalProject]]);
    yield this.#globalProject;
  }

  get(name: string): NamespaceEntry | undefined {
    for (const scope of this.#searchOrder()) {
      const entry = scope.get(name);
      if (entry !== undefined) return entry;
    }
    return undefined;
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  /** The first macro (not package) named `name`. */
  getMacro(name: string): MacroDefinition | undefined {
    for (const scope of this.#searchOrder()) {
      const entry = scope.get(name);
      if (entry !== undefined && !isMacroTable(entry)) return entry;
    }
    return undefined;
  }

  keys(): Set<string> {
    const keys = new Set<string>();
    for (const scope of this.#searchOrder()) {
      for (const key of scope.keys()) keys.add(key);
    }
    return keys;
  }

  get size(): number {
    return this.keys().size;
  }

  /**
   * `name` within one package; `null` searches the whole namespace and the
   * global project name searches the merged internal packages.
   */
  getFromPackage(packageName: string | null, name: string): MacroDefinition | undefined {
    if (packageName === null) return this.getMacro(name);
    if (packageName === GLOBAL_PROJECT_NAME) return this.#globalProject.get(name);
    const table = this.#packages.get(packageName);
    if (table === undefined) {
      throw new PackageNotFoundForMacroError(packageName);
    }
    return table.get(name);
  }
}

/**
 * Collects a project's macros into a `MacroNamespace` as seen from
 * `searchPackage`.
 *
 * `internalPackages` are merged into the global project with earlier entries
 * taking priority, so an adapter's package listed before the core package
 * overrides it.
 */
export class MacroNamespaceBuilder {
  readonly #internalPackageNames: ReadonlySet<string>;
  readonly #globals = new Map<string, MacroDefinition>();
  readonly #locals = new Map<string, MacroDefinition>();
  readonly #internalPackages = new Map<string, Map<string, MacroDefinition>>();
  readonly #packages = new Map<string, Map<string, MacroDefinition>>();

  constructor(
    readonly rootPackage: string,
    readonly searchPackage: string | null,
    readonly internalPackages: readonly string[],
  ) {
    this.#internalPackageNames = new Set(internalPackages);
  }

  addMacro(macro: MacroDefinition): void {
    if (this.#internalPackageNames.has(macro.packageName)) {
      addTo(this.#internalPackages, macro);
      return;
    }

    addTo(this.#packages, macro);
    if (macro.packageName === this.searchPackage) {
      this.#locals.set(macro.name, macro);
    } else if (macro.packageName === this.rootPackage) {
      this.#globals.set(macro.name, macro);
    }
  }

  addMacros(macros: Iterable<MacroDefinition>): this {
    for (const macro of macros) this.addMacro(macro);
    return this;
  }

  buildNamespace(): MacroNamespace {
    const globalProject = new Map<string, MacroDefinition>();
    for (const packageName of [...this.internalPackages].reverse()) {
      const table = this.#internalPackages.get(packageName);
      if (!table) continue;
      for (const [name, macro] of table) globalProject.set(name, macro);
    }

    return new MacroNamespace({
      locals: this.#locals,
      globals: this.#globals,
      packages: this.#packages,
      globalProject,
    });
  }
}

function addTo(hierarchy: Map<string, Map<string, MacroDefinition>>, macro: MacroDefinition): void {
  let table = hierarchy.get(macro.packageName);
  if (!table) {
    table = new Map();
    hierarchy.set(macro.packageName, table);
  }
  const existing = table.get(macro.name);
  if (existing) {
    throw new DuplicateMacroInPackageError(macro.name, macro.packageName, [
      existing.path ?? existing.name,
      macro.path ?? macro.name,
    ]);
  }
  table.set(macro.name, macro);
}

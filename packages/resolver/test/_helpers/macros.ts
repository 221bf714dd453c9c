import type { MacroDefinition } from "../../src/index.js";

export function macro(packageName: string, name: string): MacroDefinition {
  return { packageName, name, macroSql: `{% macro ${name}() %}{% endmacro %}` };
}

/**
 * Root project `proj`, search package `pkg_a`, a second package `pkg_b`, and
 * the internal packages `dbt_postgres` (higher priority) and `dbt`.
 */
export const projectMacros: MacroDefinition[] = [
  macro("proj", "helper"),
  macro("proj", "root_only"),
  macro("pkg_a", "helper"),
  macro("pkg_b", "only_b"),
  macro("dbt", "default__foo"),
  macro("dbt", "shared"),
  macro("dbt_postgres", "postgres__foo"),
  macro("dbt_postgres", "shared"),
];

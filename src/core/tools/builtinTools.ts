/**
 * Built-in tools for Foreman
 */

import type { ToolRegistry } from "../tool-engine";
import { evaluateExpression } from "./calculator";

/**
 * Register all built-in tools to the registry
 */
export function registerBuiltinTools(registry: ToolRegistry): void {
  registry.register(
    "calculator",
    "Perform basic mathematical calculations. Input: an arithmetic expression using + - * / % and parentheses, e.g. 12*(3+4)",
    (input) => evaluateExpression(input)
  );
}

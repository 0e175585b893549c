import type { Expr } from "./expr";
import { PRINTER_NAME } from "./op-attrs";
import { getOpRegistry, type OpRegistry } from "./op-registry";

/**
 * Render an expression in script form. Calls use the op's printer name;
 * ops without one fall back to `T.call_intrin`.
 */
export function formatExpr(
  expr: Expr,
  registry: OpRegistry = getOpRegistry(),
): string {
  switch (expr.kind) {
    case "int":
      return String(expr.value);
    case "string":
      return JSON.stringify(expr.value);
    case "buffer_region": {
      const ranges = expr.region.map(
        (range) => `${range.min}:${range.min + range.extent}`,
      );
      return `${expr.buffer.name}[${ranges.join(", ")}]`;
    }
    case "call": {
      const args = expr.args.map((arg) => formatExpr(arg, registry));
      const printerName = registry.getAttr(expr.op, PRINTER_NAME);
      if (printerName === undefined) {
        return `T.call_intrin(${[JSON.stringify(expr.dtype), JSON.stringify(expr.op.name), ...args].join(", ")})`;
      }
      return `T.${printerName}(${args.join(", ")})`;
    }
  }
}

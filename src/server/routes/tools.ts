import { Router } from "express";
import { ToolRegistry } from "../../core/tool-engine";

export function toolsRoutes(registry: ToolRegistry) {
  const r = Router();

  r.get("/list", (_req, res) => {
    try {
      const tools = registry.list().map((name) => ({
        name,
        description: registry.get(name)?.description ?? "",
      }));
      res.json({ ok: true, tools });
    } catch (error: unknown) {
      const err = error instanceof Error ? error : new Error(String(error));
      res.status(500).json({
        ok: false,
        error: { code: "internal_error", message: err.message },
      });
    }
  });

  return r;
}

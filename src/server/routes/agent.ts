import { Router, Request, Response } from "express";
import { AgentRunRequest, AgentRunSchema } from "./schemas";
import { validateBody } from "../middleware/validation";
import { ValidationError } from "../../core/errors";
import { AgentCore } from "../../core/agent/agentCore";

export function agentRoutes(agent: AgentCore) {
  const r = Router();

  r.post("/run", validateBody(AgentRunSchema), async (_req: Request, res: Response) => {
    try {
      const { goal, maxSteps }: AgentRunRequest = res.locals.validatedBody;
      const response = await agent.run(goal, maxSteps);
      res.json({ ok: true, response });
    } catch (error: unknown) {
      const err = error instanceof Error ? error : new Error(String(error));
      if (error instanceof ValidationError) {
        return res.status(400).json({
          ok: false,
          error: { code: "validation_error", message: err.message, details: error.details },
        });
      }
      res.status(500).json({
        ok: false,
        error: {
          code: "internal_error",
          message: err.message || "Internal server error",
        },
      });
    }
  });

  return r;
}

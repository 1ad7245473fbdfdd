import type { Express } from "express";
import { createServer, type Server } from "http";
import { commonSchemas, validate } from "./middleware/validation";
import { createWebhookHandler, type WebhookDeps } from "./whatsapp/events";
import { NotFoundError, errorMiddleware, handleRouteError } from "./utils/errorHandler";

export function registerRoutes(app: Express, deps: WebhookDeps): Server {
  const { storage, clock } = deps.pipeline;

  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.post("/api/whatsapp/webhook", createWebhookHandler(deps));

  app.get("/api/assignments", async (req, res) => {
    try {
      const { limit, sender } = commonSchemas.assignmentList.parse(req.query);
      const assignments = await storage.listActiveAssignments({
        now: clock(),
        limit,
        ...(sender && { excludeCompletedBy: sender }),
      });
      res.json(assignments);
    } catch (error) {
      handleRouteError(res, error, "Assignments");
    }
  });

  app.get("/api/assignments/:id", validate({ params: commonSchemas.uuidId }), async (req, res, next) => {
    try {
      const assignment = await storage.getAssignment(req.params.id);
      if (!assignment) {
        throw new NotFoundError("Assignment");
      }
      res.json(assignment);
    } catch (error) {
      next(error);
    }
  });

  app.use(errorMiddleware);

  const httpServer = createServer(app);

  return httpServer;
}

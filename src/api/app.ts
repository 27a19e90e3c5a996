import express, { Request, Response } from "express";
import cors from "cors";
import { DependencyContainer } from "tsyringe";
import { parseSchedulePayload } from "../adapters/schedule/schedule-payload.mapper";
import { isSuccess } from "../types/result.types";
import { IRequestParser } from "../services/request-parser.interface";
import { ITariffCalculationService } from "../services/tariff-calculation.interface";
import { ITariffRepository } from "../services/tariff-repository.interface";
import { toErrorResponse } from "./error-response";

function sendError(res: Response, error: unknown, context: string) {
  const { status, body } = toErrorResponse(error);
  if (status >= 500) {
    console.error(`[API] ${context} failed:`, error);
  }
  return res.status(status).json(body);
}

export function createApp(container: DependencyContainer) {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: "5mb" }));

  // POST /api/calculate - Calculate dues for a structured vessel call
  app.post("/api/calculate", async (req: Request, res: Response) => {
    try {
      const calculationService = container.resolve<ITariffCalculationService>(
        "ITariffCalculationService",
      );
      const result = await calculationService.calculate(req.body);
      return res.json({ success: true, result });
    } catch (error) {
      return sendError(res, error, "Calculation");
    }
  });

  // POST /api/calculate/natural - Free text goes through the same guardrail
  app.post("/api/calculate/natural", async (req: Request, res: Response) => {
    const { query, includeExplanation } = req.body ?? {};
    if (typeof query !== "string" || query.trim().length === 0) {
      return res.status(400).json({
        success: false,
        error: "Invalid request. query string is required.",
      });
    }

    try {
      const parser = container.resolve<IRequestParser>("IRequestParser");
      const candidate = await parser.parse(query);

      const calculationService = container.resolve<ITariffCalculationService>(
        "ITariffCalculationService",
      );
      const result = await calculationService.calculate({
        ...candidate,
        includeExplanation: includeExplanation === true,
      });
      return res.json({ success: true, parsedRequest: candidate, result });
    } catch (error) {
      return sendError(res, error, "Natural language calculation");
    }
  });

  // POST /api/schedules - Publish a structured schedule from the ingestion pipeline
  app.post("/api/schedules", (req: Request, res: Response) => {
    const parsed = parseSchedulePayload(req.body);
    if (!isSuccess(parsed)) {
      return res.status(400).json({ success: false, error: parsed.message });
    }

    try {
      const repository = container.resolve<ITariffRepository>("ITariffRepository");
      const version = repository.publish(parsed.data);
      return res.status(201).json({ success: true, version });
    } catch (error) {
      return sendError(res, error, "Schedule publication");
    }
  });

  // GET /api/schedules/:port - Latest schedule snapshot for a port
  app.get("/api/schedules/:port", (req: Request, res: Response) => {
    try {
      const repository = container.resolve<ITariffRepository>("ITariffRepository");
      const version = typeof req.query.version === "string" ? req.query.version : undefined;
      const schedule = repository.getSnapshot(req.params.port.toUpperCase(), version);
      return res.json({ success: true, schedule });
    } catch (error) {
      return sendError(res, error, "Schedule lookup");
    }
  });

  // GET /api/ports - Ports with a published schedule
  app.get("/api/ports", (_req: Request, res: Response) => {
    const repository = container.resolve<ITariffRepository>("ITariffRepository");
    return res.json({ ports: repository.listPorts(), versions: repository.listVersions() });
  });

  // Health check endpoint
  app.get("/health", (_req: Request, res: Response) => {
    const repository = container.resolve<ITariffRepository>("ITariffRepository");
    const ports = repository.listPorts();
    res.status(ports.length > 0 ? 200 : 503).json({
      status: ports.length > 0 ? "ok" : "no_schedule",
      ports: ports.length,
    });
  });

  return app;
}

import express, { type Express } from "express";
import type { Server } from "http";
import { z } from "zod";
import { parseRef, type ResourceRef } from "@shared/fhirTypes";
import { getBundlesDir } from "./config";
import { deleteEntityGraph } from "./deletion/graphDeleter";
import { ProvisioningError } from "./errors";
import { targetResolution } from "./middleware/target";
import { uploadAddonDocument } from "./provisioning/addonDocumentService";
import { loadSharedResourceRefs } from "./provisioning/bundleLoader";
import { runPipeline } from "./provisioning/pipelineController";
import { getActivityFeed, startActivityFeed } from "./services/activityFeedService";

const pipelineRunSchema = z.object({
  entityId: z.string().min(1),
  practiceId: z.string().min(1),
  startStep: z.number().int().min(1).max(6).optional(),
  entityType: z.string().min(1).optional(),
});

const entityDeletionQuerySchema = z.object({
  practiceId: z.string().min(1).optional(),
  entityType: z.string().min(1).optional(),
  deleteShared: z.enum(["true", "false"]).optional(),
});

const addonDocumentQuerySchema = z.object({
  practiceId: z.string().min(1),
  entityType: z.string().min(1).optional(),
  fileName: z.string().min(1).optional(),
});

const activityQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).optional(),
  entityId: z.string().min(1).optional(),
});

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
}

export async function registerRoutes(
  httpServer: Server,
  app: Express
): Promise<Server> {

  startActivityFeed();

  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/api/activity", (req, res) => {
    const parsed = activityQuerySchema.safeParse(req.query);
    if (!parsed.success) return res.status(400).json({ message: formatIssues(parsed.error) });
    return res.json(getActivityFeed(parsed.data));
  });

  app.use("/api", targetResolution);

  app.post("/api/pipeline-runs", async (req, res, next) => {
    const parsed = pipelineRunSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ message: formatIssues(parsed.error) });

    try {
      const result = await runPipeline(req.targetContext, parsed.data);
      if (result.success) return res.status(201).json(result);
      const status = result.failure?.code === "PREREQUISITE_NOT_MET" ? 409 : 502;
      return res.status(status).json(result);
    } catch (err) {
      if (err instanceof ProvisioningError) {
        return res.status(err.statusCode).json({ message: err.message, code: err.code });
      }
      next(err);
    }
  });

  app.delete("/api/entities/:identifier", async (req, res, next) => {
    const parsed = entityDeletionQuerySchema.safeParse(req.query);
    if (!parsed.success) return res.status(400).json({ message: formatIssues(parsed.error) });

    try {
      let sharedResources: ResourceRef[] | undefined;
      if (parsed.data.deleteShared === "true") {
        const refs = await loadSharedResourceRefs(getBundlesDir());
        sharedResources = refs.map(parseRef).filter((ref): ref is ResourceRef => ref !== undefined);
      }
      const summary = await deleteEntityGraph(req.targetContext, req.params.identifier, {
        practiceId: parsed.data.practiceId,
        entityType: parsed.data.entityType,
        sharedResources,
      });
      return res.json(summary);
    } catch (err) {
      if (err instanceof ProvisioningError) {
        return res.status(err.statusCode).json({ message: err.message, code: err.code });
      }
      next(err);
    }
  });

  app.post(
    "/api/entities/:identifier/documents",
    express.text({ type: ["application/xml", "text/xml"], limit: "5mb" }),
    async (req, res, next) => {
      const parsed = addonDocumentQuerySchema.safeParse(req.query);
      if (!parsed.success) return res.status(400).json({ message: formatIssues(parsed.error) });
      if (typeof req.body !== "string") {
        return res.status(415).json({ message: "Send the document as application/xml or text/xml" });
      }

      try {
        const result = await uploadAddonDocument(req.targetContext, {
          entityId: req.params.identifier,
          practiceId: parsed.data.practiceId,
          entityType: parsed.data.entityType,
          fileName: parsed.data.fileName,
          document: req.body,
        });
        if (result.success) return res.status(201).json(result);
        return res.status(result.failure?.code === "NOT_FOUND" ? 404 : 502).json(result);
      } catch (err) {
        if (err instanceof ProvisioningError) {
          return res.status(err.statusCode).json({ message: err.message, code: err.code });
        }
        next(err);
      }
    },
  );

  return httpServer;
}

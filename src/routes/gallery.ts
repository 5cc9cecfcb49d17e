/**
 * Gallery routes.
 *
 * GET /api/gallery              : recent generations, newest first
 * GET /api/gallery/:index/image : raw image bytes; ?download=1 for an attachment
 */

import { Router, Request, Response } from "express";
import { currentSession, requireSession } from "../middleware/auth";
import { toPublicGalleryEntry } from "../models/session";

const galleryRouter = Router();

const EXTENSIONS: Record<string, string> = {
  "image/png": "png",
  "image/jpeg": "jpg",
  "image/webp": "webp",
  "image/svg+xml": "svg",
};

// ---------------------------------------------------------------------------
// GET /: List entries
// ---------------------------------------------------------------------------

galleryRouter.get("/", requireSession, (req: Request, res: Response) => {
  const { gallery } = currentSession(req);

  res.status(200).json({
    entries: gallery.list().map((entry, index) => toPublicGalleryEntry(entry, index)),
    capacity: gallery.capacity,
  });
});

// ---------------------------------------------------------------------------
// GET /:index/image: Display or download one image
// ---------------------------------------------------------------------------

galleryRouter.get(
  "/:index/image",
  requireSession,
  (req: Request, res: Response) => {
    const index = Number(req.params.index);
    const entry = Number.isInteger(index) && index >= 0
      ? currentSession(req).gallery.get(index)
      : undefined;

    if (!entry) {
      res.status(404).json({
        error: { message: "Gallery entry not found", code: "NOT_FOUND" },
      });
      return;
    }

    if (req.query.download === "1" || req.query.download === "true") {
      const ext = EXTENSIONS[entry.mimeType] ?? "bin";
      res.attachment(`generated-${entry.id}.${ext}`);
    }

    res.status(200).type(entry.mimeType).send(entry.image);
  }
);

export { galleryRouter };

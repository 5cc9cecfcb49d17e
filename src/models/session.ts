/**
 * Public shapes for session state returned by API responses.
 * Dates become ISO strings and image bytes become base64.
 */

import type { GalleryEntry } from "../services/gallery/galleryStore";
import type { ImageModel } from "../services/imageGeneration/models";
import { normalize, remaining, type Quota } from "../services/quota/quotaTracker";
import type { SessionAuth, SessionState } from "../services/sessionStore";

export interface PublicQuota {
  count: number;
  limit: number;
  remaining: number;
  windowDate: string;
}

export interface PublicGalleryEntry {
  index: number;
  id: string;
  prompt: string;
  model: string;
  provider: string;
  mimeType: string;
  /** Base64-encoded image bytes */
  data: string;
  createdAt: string;
}

export interface PublicSession {
  sessionId: string;
  auth: SessionAuth;
  quota: PublicQuota;
  gallerySize: number;
  createdAt: string;
}

export interface PublicModel {
  id: string;
  label: string;
  requiresAccess: boolean;
  /** False when the model is gated and no credential is configured */
  available: boolean;
  size: { min: number; max: number; default: number };
  supports: { negativePrompt: boolean; guidanceScale: boolean; steps: boolean };
}

/** Quota as seen today; a stale window reads as a fresh one. */
export function toPublicQuota(quota: Quota, today: string): PublicQuota {
  const current = normalize(quota, today);
  return {
    count: current.count,
    limit: current.limit,
    remaining: remaining(current, today),
    windowDate: current.windowDate,
  };
}

export function toPublicGalleryEntry(entry: GalleryEntry, index: number): PublicGalleryEntry {
  return {
    index,
    id: entry.id,
    prompt: entry.prompt,
    model: entry.modelId,
    provider: entry.provider,
    mimeType: entry.mimeType,
    data: entry.image.toString("base64"),
    createdAt: entry.createdAt.toISOString(),
  };
}

export function toPublicSession(session: SessionState, today: string): PublicSession {
  return {
    sessionId: session.id,
    auth: { ...session.auth },
    quota: toPublicQuota(session.quota, today),
    gallerySize: session.gallery.size,
    createdAt: session.createdAt.toISOString(),
  };
}

export function toPublicModel(model: ImageModel, hasCredential: boolean): PublicModel {
  return {
    id: model.id,
    label: model.label,
    requiresAccess: model.requiresAccess,
    available: !model.requiresAccess || hasCredential,
    size: { min: model.minSize, max: model.maxSize, default: model.defaultSize },
    supports: {
      negativePrompt: model.supportsNegativePrompt,
      guidanceScale: model.supportsGuidance,
      steps: model.supportsSteps,
    },
  };
}

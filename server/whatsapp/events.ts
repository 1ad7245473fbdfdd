/**
 * WhatsApp Events Handler
 *
 * Receives WAHA webhooks. Flow:
 * 1. Validate the envelope
 * 2. ACK immediately (WAHA retries slow webhooks)
 * 3. Drop non-message events and the bot's own messages
 * 4. Dedupe on id + sender + body prefix
 * 5. Run the pipeline in the background and deliver its replies in order
 *
 * Layer: WhatsApp (event handling)
 */

import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import { processIncomingMessage, type IncomingMessage, type PipelineDeps } from "../messaging/pipeline";
import { buildDedupeKey, type MessageDeduplicator } from "../services/messageDeduplicator";
import { getErrorMessage, logError, type JsonResponder } from "../utils/errorHandler";
import type { MessageGateway } from "./gatewayApi";

const MESSAGE_EVENTS = new Set(["message", "message.any"]);

export const wahaWebhookSchema = z.object({
  event: z.string().min(1),
  session: z.string().optional(),
  payload: z.unknown(),
});

export const wahaMessageSchema = z.object({
  id: z.string().min(1),
  from: z.string().min(1),
  fromMe: z.boolean().default(false),
  participant: z.string().nullish(),
  body: z.string().nullish().transform((v) => v ?? ""),
  hasMedia: z.boolean().default(false),
  media: z
    .object({
      url: z.string().nullish(),
      mimetype: z.string().nullish(),
      data: z.string().nullish(),
    })
    .nullish(),
  replyTo: z
    .object({
      id: z.string().nullish(),
      body: z.string().nullish(),
    })
    .nullish(),
});

export type WahaMessage = z.infer<typeof wahaMessageSchema>;

export type WebhookDeps = {
  pipeline: PipelineDeps;
  gateway: MessageGateway;
  deduplicator: MessageDeduplicator;
};

async function loadImage(
  message: WahaMessage,
  gateway: MessageGateway,
): Promise<{ base64: string; mimeType: string } | null> {
  const media = message.media;
  if (!message.hasMedia || !media) return null;
  if (media.mimetype && !media.mimetype.startsWith("image/")) return null;

  if (media.data) {
    return { base64: media.data, mimeType: media.mimetype ?? "image/jpeg" };
  }
  if (media.url) {
    try {
      const downloaded = await gateway.downloadMedia(media.url);
      return { base64: downloaded.base64, mimeType: media.mimetype ?? downloaded.mimeType };
    } catch (err) {
      console.warn(`[WhatsApp] Media download failed for ${message.id}, continuing text-only: ${getErrorMessage(err)}`);
    }
  }
  return null;
}

export function toIncomingMessage(message: WahaMessage, image: { base64: string; mimeType: string } | null): IncomingMessage {
  return {
    senderId: message.participant ?? message.from,
    chatId: message.from,
    text: message.body,
    messageId: message.id,
    ...(image && { imageBase64: image.base64, imageMimeType: image.mimeType }),
    ...(message.replyTo?.body && { quotedText: message.replyTo.body }),
  };
}

export async function handleWahaMessage(message: WahaMessage, deps: WebhookDeps): Promise<void> {
  deps.deduplicator.maybeCleanup();
  const claimed = await deps.deduplicator.claim(buildDedupeKey(message.id, message.from, message.body));
  if (!claimed) return;

  const image = await loadImage(message, deps.gateway);
  if (!message.body.trim() && !image) {
    console.log(`[WhatsApp] Ignoring empty message ${message.id}`);
    return;
  }

  const replies = await processIncomingMessage(toIncomingMessage(message, image), deps.pipeline);
  for (const reply of replies) {
    try {
      await deps.gateway.sendText(reply);
    } catch (err) {
      logError("WhatsApp", err);
    }
  }
}

export type WebhookRequest = { body: unknown };

export function createWebhookHandler(deps: WebhookDeps) {
  return (req: WebhookRequest, res: JsonResponder): void => {
    const envelope = wahaWebhookSchema.safeParse(req.body);
    if (!envelope.success) {
      res.status(400).json({ error: fromZodError(envelope.error).message });
      return;
    }

    // ACK before any work
    res.status(200).json({ status: "received" });

    const { event, payload } = envelope.data;
    if (!MESSAGE_EVENTS.has(event)) {
      console.log(`[WhatsApp] Ignoring event: ${event}`);
      return;
    }

    const parsed = wahaMessageSchema.safeParse(payload);
    if (!parsed.success) {
      console.warn(`[WhatsApp] Unreadable message payload: ${fromZodError(parsed.error).message}`);
      return;
    }
    if (parsed.data.fromMe) {
      console.log("[WhatsApp] Ignoring bot's own message");
      return;
    }

    handleWahaMessage(parsed.data, deps).catch((err) => {
      logError("WhatsApp", err);
    });
  };
}

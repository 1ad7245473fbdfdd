/**
 * WhatsApp gateway (WAHA) integration layer.
 *
 * Responsibilities:
 * - Deliver text replies
 * - Download media referenced by inbound events
 *
 * This file MUST NOT contain business logic.
 *
 * Layer: Integration (I/O only)
 */

import type { AppConfig } from "../config/env";
import type { OutgoingReply } from "../messaging/pipeline";
import { ExternalServiceError } from "../utils/errorHandler";

export type DownloadedMedia = {
  base64: string;
  mimeType: string;
};

export interface MessageGateway {
  sendText(reply: OutgoingReply): Promise<void>;
  downloadMedia(url: string): Promise<DownloadedMedia>;
}

type FetchFn = typeof fetch;

export function createWahaGateway(config: AppConfig["waha"], fetchImpl: FetchFn = fetch): MessageGateway {
  const baseUrl = config.url.replace(/\/+$/, "");

  function headers(): Record<string, string> {
    return {
      "Content-Type": "application/json",
      ...(config.apiKey && { "X-Api-Key": config.apiKey }),
    };
  }

  return {
    async sendText({ chatId, text }: OutgoingReply): Promise<void> {
      const response = await fetchImpl(`${baseUrl}/api/sendText`, {
        method: "POST",
        headers: headers(),
        body: JSON.stringify({ chatId, text, session: config.session }),
      });

      if (!response.ok) {
        const body = await response.text();
        throw new ExternalServiceError("WAHA", `sendText failed with ${response.status}: ${body.slice(0, 200)}`);
      }
      console.log(`[WAHA] Sent ${text.length} chars to ${chatId}`);
    },

    async downloadMedia(url: string): Promise<DownloadedMedia> {
      const response = await fetchImpl(url, { headers: headers() });
      if (!response.ok) {
        throw new ExternalServiceError("WAHA", `media download failed with ${response.status}`);
      }
      const buffer = Buffer.from(await response.arrayBuffer());
      return {
        base64: buffer.toString("base64"),
        mimeType: response.headers.get("content-type") ?? "image/jpeg",
      };
    },
  };
}

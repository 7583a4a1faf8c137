// =============================================================================
// @paper-courier/worker — Slack posting
// =============================================================================
// One WebClient per target token. Each rendered article is posted once per
// target; link unfurling is off because the link block already shows the URL.
// =============================================================================

import { WebClient } from "@slack/web-api";
import type { OutgoingMessage, SlackTarget } from "@paper-courier/shared";

export interface MessagePoster {
  post(target: SlackTarget, message: OutgoingMessage): Promise<void>;
}

export class SlackPoster implements MessagePoster {
  private readonly clients = new Map<string, WebClient>();

  private client(token: string): WebClient {
    let client = this.clients.get(token);
    if (!client) {
      client = new WebClient(token);
      this.clients.set(token, client);
    }
    return client;
  }

  async post(target: SlackTarget, message: OutgoingMessage): Promise<void> {
    const client = this.client(target.token);
    const common = {
      channel: target.channel,
      text: message.text,
      unfurl_links: false,
      unfurl_media: false,
    };

    if (message.format === "blocks") {
      await client.chat.postMessage({ ...common, blocks: message.blocks });
    } else {
      await client.chat.postMessage({
        ...common,
        attachments: message.attachments,
      });
    }
  }
}

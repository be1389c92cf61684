import { PushMessage } from "@orderdesk/types";
import { Logger } from "@nestjs/common";
import { App, cert, initializeApp, ServiceAccount } from "firebase-admin/app";
import { getMessaging, Message, Messaging } from "firebase-admin/messaging";

export interface PushSender {
  /** Resolves the provider message id; rejects when delivery fails. */
  send(message: PushMessage): Promise<string>;
}

export function toProviderMessage(message: PushMessage): Message {
  return {
    token: message.token,
    notification: { title: message.title, body: message.body },
    data: message.data,
    android: { priority: "high" },
    apns: { headers: { "apns-priority": "10" } },
  };
}

export function decodeServiceAccount(base64: string): ServiceAccount {
  const parsed: unknown = JSON.parse(Buffer.from(base64, "base64").toString("utf8"));
  if (typeof parsed !== "object" || parsed === null) {
    throw new Error("Firebase service account must be a JSON object");
  }
  const read = (snake: string, camel: string): string | undefined => {
    const value = snake in parsed ? Reflect.get(parsed, snake) : Reflect.get(parsed, camel);
    return typeof value === "string" ? value : undefined;
  };
  const account: ServiceAccount = {
    projectId: read("project_id", "projectId"),
    clientEmail: read("client_email", "clientEmail"),
    privateKey: read("private_key", "privateKey"),
  };
  if (!account.projectId || !account.clientEmail || !account.privateKey) {
    throw new Error("Firebase service account is missing project_id, client_email or private_key");
  }
  return account;
}

export class FirebasePushSender implements PushSender {
  private readonly messaging: Messaging;

  constructor(serviceAccount: ServiceAccount, appName = "order-service") {
    const app: App = initializeApp({ credential: cert(serviceAccount) }, appName);
    this.messaging = getMessaging(app);
  }

  send(message: PushMessage): Promise<string> {
    return this.messaging.send(toProviderMessage(message));
  }
}

/** Used when no push provider is configured; records what would have been sent. */
export class LoggingPushSender implements PushSender {
  private readonly logger = new Logger(LoggingPushSender.name);
  private sequence = 0;

  async send(message: PushMessage): Promise<string> {
    this.sequence += 1;
    this.logger.log(`push (not delivered) ${message.data.type} to ${message.token.slice(0, 8)}…: ${message.title}`);
    return `local-${this.sequence}`;
  }
}

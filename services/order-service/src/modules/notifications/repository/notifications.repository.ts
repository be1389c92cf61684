import { DocumentStore, StoredDocument } from "@orderdesk/database";
import { NotificationRecord } from "@orderdesk/types";
import { Inject, Injectable } from "@nestjs/common";
import { booleanField, stringField } from "../../../common/document-fields";
import { DOCUMENT_STORE } from "../../../common/tokens";

const NOTIFICATIONS = "notifications";
const USERS = "users";

@Injectable()
export class NotificationsRepository {
  constructor(@Inject(DOCUMENT_STORE) private readonly store: DocumentStore) {}

  async insert(input: Omit<NotificationRecord, "id">): Promise<NotificationRecord> {
    const id = await this.store.add(NOTIFICATIONS, {
      userId: input.userId,
      title: input.title,
      body: input.body,
      type: input.type,
      orderId: input.orderId,
      status: input.status,
      createdAtIso: input.createdAtIso,
      read: input.read,
    });
    return { id, ...input };
  }

  async listForUser(userId: string, limit: number): Promise<NotificationRecord[]> {
    const docs = await this.store.query(NOTIFICATIONS, {
      where: [{ field: "userId", value: userId }],
      orderBy: { field: "createdAtIso", direction: "desc" },
      limit,
    });
    return docs.flatMap((doc) => {
      const record = this.mapNotification(doc);
      return record ? [record] : [];
    });
  }

  async getUserDeviceToken(userId: string): Promise<string | null> {
    const doc = await this.store.get(USERS, userId);
    return (doc && stringField(doc.data, "fcmToken")) || null;
  }

  async setUserDeviceToken(userId: string, token: string, nowIso: string): Promise<void> {
    await this.store.set(USERS, userId, { fcmToken: token, fcmTokenUpdatedAtIso: nowIso }, { merge: true });
  }

  private mapNotification(doc: StoredDocument): NotificationRecord | null {
    const userId = stringField(doc.data, "userId");
    const orderId = stringField(doc.data, "orderId");
    if (!userId || !orderId) return null;
    return {
      id: doc.id,
      userId,
      title: stringField(doc.data, "title") || "",
      body: stringField(doc.data, "body") || "",
      type: "order",
      orderId,
      status: stringField(doc.data, "status") || "",
      createdAtIso: stringField(doc.data, "createdAtIso") || "",
      read: booleanField(doc.data, "read") ?? false,
    };
  }
}

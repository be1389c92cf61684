import { DocumentStore, StoredDocument } from "@orderdesk/database";
import { AdminRecord } from "@orderdesk/types";
import { Inject, Injectable } from "@nestjs/common";
import { compactDocument, stringField } from "../../../common/document-fields";
import { DOCUMENT_STORE } from "../../../common/tokens";

const ADMINS = "admins";

@Injectable()
export class AdminRepository {
  constructor(@Inject(DOCUMENT_STORE) private readonly store: DocumentStore) {}

  async findById(adminId: string): Promise<AdminRecord | null> {
    const doc = await this.store.get(ADMINS, adminId);
    return doc ? this.mapAdmin(doc) : null;
  }

  async findByEmail(email: string): Promise<AdminRecord | null> {
    const docs = await this.store.query(ADMINS, {
      where: [{ field: "email", value: email.trim().toLowerCase() }],
      limit: 1,
    });
    const doc = docs[0];
    return doc ? this.mapAdmin(doc) : null;
  }

  async listAll(): Promise<AdminRecord[]> {
    const docs = await this.store.query(ADMINS);
    return docs.flatMap((doc) => {
      const admin = this.mapAdmin(doc);
      return admin ? [admin] : [];
    });
  }

  async create(input: Omit<AdminRecord, "id">): Promise<AdminRecord> {
    const email = input.email.trim().toLowerCase();
    const id = await this.store.add(ADMINS, compactDocument({
      email,
      name: input.name,
      passwordHash: input.passwordHash,
      createdAtIso: input.createdAtIso,
      fcmToken: input.fcmToken,
      fcmTokenUpdatedAtIso: input.fcmTokenUpdatedAtIso,
    }));
    return { ...input, email, id };
  }

  async setDeviceToken(adminId: string, token: string, nowIso: string): Promise<boolean> {
    const updated = await this.store.update(ADMINS, adminId, { fcmToken: token, fcmTokenUpdatedAtIso: nowIso });
    return updated !== null;
  }

  private mapAdmin(doc: StoredDocument): AdminRecord | null {
    const email = stringField(doc.data, "email");
    const passwordHash = stringField(doc.data, "passwordHash");
    if (!email || !passwordHash) return null;

    const fcmToken = stringField(doc.data, "fcmToken");
    const fcmTokenUpdatedAtIso = stringField(doc.data, "fcmTokenUpdatedAtIso");
    return {
      id: doc.id,
      email,
      name: stringField(doc.data, "name") || "Admin",
      passwordHash,
      createdAtIso: stringField(doc.data, "createdAtIso") || "",
      ...(fcmToken ? { fcmToken } : {}),
      ...(fcmTokenUpdatedAtIso ? { fcmTokenUpdatedAtIso } : {}),
    };
  }
}

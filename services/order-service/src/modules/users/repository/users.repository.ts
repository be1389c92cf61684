import { DocumentStore, StoredDocument } from "@orderdesk/database";
import { UserProfile } from "@orderdesk/types";
import { Inject, Injectable } from "@nestjs/common";
import { arrayField, stringField } from "../../../common/document-fields";
import { DOCUMENT_STORE } from "../../../common/tokens";

const USERS = "users";

export interface SaveUserInput {
  userId: string;
  email: string;
  displayName: string | null;
  phoneNumbers: string[];
}

/**
 * Profiles share `users/<id>` with device registration, so writes merge and
 * documents holding only a device token are not profiles.
 */
@Injectable()
export class UsersRepository {
  constructor(@Inject(DOCUMENT_STORE) private readonly store: DocumentStore) {}

  async findById(userId: string): Promise<UserProfile | null> {
    const doc = await this.store.get(USERS, userId);
    return doc ? this.mapUser(doc) : null;
  }

  async list(): Promise<UserProfile[]> {
    const docs = await this.store.query(USERS, { orderBy: { field: "createdAtIso", direction: "asc" } });
    return docs.flatMap((doc) => {
      const user = this.mapUser(doc);
      return user ? [user] : [];
    });
  }

  /** Creates or replaces the profile fields. The first `createdAtIso` is kept. */
  async save(input: SaveUserInput, nowIso: string): Promise<UserProfile> {
    const createdAtIso = await this.store.runTransaction(async (tx) => {
      const existing = await tx.get(USERS, input.userId);
      const firstCreated = (existing && stringField(existing.data, "createdAtIso")) || nowIso;
      tx.set(
        USERS,
        input.userId,
        {
          userId: input.userId,
          email: input.email,
          displayName: input.displayName,
          phoneNumbers: input.phoneNumbers,
          createdAtIso: firstCreated,
          updatedAtIso: nowIso,
        },
        { merge: true },
      );
      return firstCreated;
    });
    return { id: input.userId, ...input, createdAtIso, updatedAtIso: nowIso };
  }

  private mapUser(doc: StoredDocument): UserProfile | null {
    const email = stringField(doc.data, "email");
    if (!email) return null;
    return {
      id: doc.id,
      userId: stringField(doc.data, "userId") || doc.id,
      email,
      displayName: stringField(doc.data, "displayName") ?? null,
      phoneNumbers: (arrayField(doc.data, "phoneNumbers") || []).flatMap((value) => (typeof value === "string" ? [value] : [])),
      createdAtIso: stringField(doc.data, "createdAtIso") || "",
      updatedAtIso: stringField(doc.data, "updatedAtIso") || "",
    };
  }
}

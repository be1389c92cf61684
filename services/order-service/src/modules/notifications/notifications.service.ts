import { NotificationRecord, PushMessage } from "@orderdesk/types";
import { Inject, Injectable, Logger } from "@nestjs/common";
import { NotFoundError, ValidationError } from "../../common/errors";
import { PUSH_SENDER } from "../../common/tokens";
import { AdminRepository } from "../auth/repository/admin.repository";
import { PushSender } from "./push-sender";
import { NotificationsRepository } from "./repository/notifications.repository";

export const NEW_ORDER_ALERT_TITLE = "🛒 New Order Received";

@Injectable()
export class NotificationsService {
  private readonly logger = new Logger(NotificationsService.name);

  constructor(
    private readonly notificationsRepository: NotificationsRepository,
    private readonly admins: AdminRepository,
    @Inject(PUSH_SENDER) private readonly pushSender: PushSender,
  ) {}

  /**
   * Persists the notification, then attempts a push to the user's registered
   * device. Push problems are logged and never surface to the caller.
   */
  async notify(userId: string, orderId: string, status: string, title: string, body: string): Promise<NotificationRecord> {
    const record = await this.notificationsRepository.insert({
      userId,
      title,
      body,
      type: "order",
      orderId,
      status,
      createdAtIso: new Date().toISOString(),
      read: false,
    });

    let token: string | null;
    try {
      token = await this.notificationsRepository.getUserDeviceToken(userId);
    } catch (error) {
      this.logger.warn(`Device lookup for ${userId} failed: ${String(error)}`);
      return record;
    }
    if (!token) {
      this.logger.warn(`No device registered for ${userId}; push skipped for ${orderId}`);
      return record;
    }

    await this.deliver({
      token,
      title,
      body,
      data: { type: "order_update", orderId, status, title, body },
    }, `order ${orderId} to ${userId}`);
    return record;
  }

  /** Resolves the number of admins the alert reached. */
  async alertAdminsNewOrder(orderId: string, totalAmount: number): Promise<number> {
    const admins = await this.admins.listAll();
    const body = `Order ${orderId} • Total: ${totalAmount.toFixed(2)}`;
    let delivered = 0;

    for (const admin of admins) {
      if (!admin.fcmToken) continue;
      const sent = await this.deliver({
        token: admin.fcmToken,
        title: NEW_ORDER_ALERT_TITLE,
        body,
        data: { type: "new_order", orderId, totalAmount: String(totalAmount) },
      }, `new order ${orderId} to admin ${admin.id}`);
      if (sent) delivered += 1;
    }
    return delivered;
  }

  listForUser(userId: string): Promise<NotificationRecord[]> {
    return this.notificationsRepository.listForUser(userId, 100);
  }

  async registerUserDevice(userId: string, token: string): Promise<void> {
    await this.notificationsRepository.setUserDeviceToken(userId, this.normalizeToken(token), new Date().toISOString());
  }

  async registerAdminDevice(adminId: string, token: string): Promise<void> {
    const updated = await this.admins.setDeviceToken(adminId, this.normalizeToken(token), new Date().toISOString());
    if (!updated) throw new NotFoundError("Admin not found");
  }

  private async deliver(message: PushMessage, label: string): Promise<boolean> {
    try {
      await this.pushSender.send(message);
      return true;
    } catch (error) {
      this.logger.warn(`Push for ${label} failed: ${String(error)}`);
      return false;
    }
  }

  private normalizeToken(token: string): string {
    const trimmed = token.trim();
    if (!trimmed) throw new ValidationError("token is required");
    return trimmed;
  }
}

/**
 * Alert Notifier - Multi-Channel Escalation Routing
 *
 * The control plane's notification action. Routes escalations to the
 * configured channels (log, Slack, webhook, Telegram) with a per-target
 * cooldown, and keeps a bounded alert history for acknowledgment.
 */

import type { AlertSettings } from "../config/settings.js";
import { errorMessage } from "../utils/async.js";
import type { EscalationNotifier, RecoveryAttempt } from "./ControlPlane.js";
import type { ActionOutcome, EscalationRecord, Target } from "./types.js";

// ============================================================================
// Types
// ============================================================================

export type AlertChannel = AlertSettings["channels"][number];

export type AlertSeverity = "info" | "warning" | "critical";

export interface Alert {
  id: string;
  target: string;
  severity: AlertSeverity;
  message: string;
  timestamp: string;
  acknowledged: boolean;
  /** Escalation record at the time of the alert */
  escalation?: EscalationRecord | undefined;
}

type Env = Record<string, string | undefined>;

type Fetch = typeof fetch;

export interface AlertNotifierOptions {
  now?: (() => number) | undefined;
  fetch?: Fetch | undefined;
}

// ============================================================================
// Alert Notifier
// ============================================================================

export class AlertNotifier implements EscalationNotifier {
  private readonly lastAlerts = new Map<string, number>();
  private readonly alertHistory: Alert[] = [];
  private readonly now: () => number;
  private readonly fetchImpl: Fetch;
  private sequence = 0;

  constructor(
    private readonly config: AlertSettings,
    options: AlertNotifierOptions = {}
  ) {
    this.now = options.now ?? Date.now;
    this.fetchImpl = options.fetch ?? fetch;
  }

  /**
   * Escalation notification. Succeeds when at least one channel delivered
   * (or a matching alert is still within its cooldown).
   */
  async notify(
    target: Target,
    record: EscalationRecord,
    history: readonly RecoveryAttempt[]
  ): Promise<ActionOutcome> {
    const severity: AlertSeverity = target.critical ? "critical" : "warning";
    const lastAttempt = history.length > 0 ? history[history.length - 1] : undefined;

    let message = `[infrawatch] ${target.name.toUpperCase()} is FAILING after ${record.retryCount} recovery attempts`;
    if (lastAttempt) {
      message += `\nLast attempt (${lastAttempt.action}): ${lastAttempt.detail}`;
    }

    const alert = this.createAlert(target.name, severity, message, record);
    return this.send(alert);
  }

  /**
   * Recovery notification for an escalated target that became HEALTHY
   */
  async resolved(target: Target, record: EscalationRecord): Promise<void> {
    this.clearCooldown(target.name);
    const alert = this.createAlert(
      target.name,
      "info",
      `[infrawatch] ${target.name.toUpperCase()} has recovered and is now healthy`,
      record
    );
    await this.send(alert);
  }

  /**
   * Send an alert to every configured channel
   */
  async send(alert: Alert): Promise<ActionOutcome> {
    const alertKey = `${alert.target}-${alert.severity}`;
    const lastSent = this.lastAlerts.get(alertKey);

    if (lastSent !== undefined && this.now() - lastSent < this.config.cooldownMs) {
      console.log(`[AlertNotifier] Skipping alert (cooldown): ${alertKey}`);
      return { success: true, detail: "suppressed by cooldown" };
    }

    this.alertHistory.push(alert);
    if (this.alertHistory.length > this.config.maxHistory) {
      this.alertHistory.shift();
    }

    const results = await Promise.all(
      this.config.channels.map(async (channel) => ({ channel, delivered: await this.deliver(channel, alert) }))
    );
    const delivered = results.filter((r) => r.delivered).map((r) => r.channel);

    if (delivered.length === 0) {
      return { success: false, detail: "no channel delivered the alert" };
    }
    this.lastAlerts.set(alertKey, this.now());
    return { success: true, detail: `delivered via ${delivered.join(", ")}` };
  }

  acknowledge(alertId: string): boolean {
    const alert = this.alertHistory.find((a) => a.id === alertId);
    if (alert) {
      alert.acknowledged = true;
      return true;
    }
    return false;
  }

  /**
   * Alert history, newest first
   */
  getHistory(limit?: number): Alert[] {
    const history = [...this.alertHistory].reverse();
    return limit ? history.slice(0, limit) : history;
  }

  getUnacknowledged(): Alert[] {
    return this.alertHistory.filter((a) => !a.acknowledged);
  }

  /**
   * Allow an immediate re-alert for a target
   */
  clearCooldown(target: string): void {
    for (const key of [...this.lastAlerts.keys()]) {
      if (key.startsWith(`${target}-`)) {
        this.lastAlerts.delete(key);
      }
    }
  }

  // ==========================================================================
  // Channels
  // ==========================================================================

  private createAlert(
    target: string,
    severity: AlertSeverity,
    message: string,
    escalation: EscalationRecord
  ): Alert {
    this.sequence++;
    return {
      id: `alert-${target}-${this.now()}-${this.sequence}`,
      target,
      severity,
      message,
      timestamp: new Date(this.now()).toISOString(),
      acknowledged: false,
      escalation,
    };
  }

  private async deliver(channel: AlertChannel, alert: Alert): Promise<boolean> {
    try {
      switch (channel) {
        case "log":
          this.sendLog(alert);
          return true;
        case "slack":
          return await this.sendSlack(alert);
        case "webhook":
          return await this.sendWebhook(alert);
        case "telegram":
          return await this.sendTelegram(alert);
      }
    } catch (error) {
      console.error(`[AlertNotifier] ${channel} send failed:`, errorMessage(error));
      return false;
    }
  }

  private sendLog(alert: Alert): void {
    const logMessage = `[ALERT] ${alert.timestamp} | ${alert.severity.toUpperCase()} | ${alert.target} | ${alert.message.replace(/\n/g, " ")}`;

    switch (alert.severity) {
      case "critical":
        console.error(logMessage);
        break;
      case "warning":
        console.warn(logMessage);
        break;
      default:
        console.log(logMessage);
    }
  }

  private async sendSlack(alert: Alert): Promise<boolean> {
    const slack = this.config.slack;
    if (!slack) return false;

    const severityColors: Record<AlertSeverity, string> = {
      critical: "#dc3545",
      warning: "#ffc107",
      info: "#17a2b8",
    };

    const payload = {
      username: slack.username ?? "infrawatch",
      channel: slack.channel,
      attachments: [
        {
          color: severityColors[alert.severity],
          title: `${alert.severity.toUpperCase()}: ${alert.target}`,
          text: alert.message,
          fields: [
            { title: "Target", value: alert.target, short: true },
            { title: "Level", value: alert.escalation?.level ?? "NONE", short: true },
          ],
          ts: Math.floor(this.now() / 1000).toString(),
        },
      ],
    };

    await this.post(slack.webhookUrl, "POST", {}, payload, "Slack webhook");
    console.log(`[AlertNotifier] Slack alert sent for ${alert.target}`);
    return true;
  }

  private async sendWebhook(alert: Alert): Promise<boolean> {
    const webhook = this.config.webhook;
    if (!webhook) return false;

    await this.post(webhook.url, webhook.method ?? "POST", webhook.headers ?? {}, alert, "Webhook");
    console.log(`[AlertNotifier] Webhook sent for ${alert.target}`);
    return true;
  }

  private async sendTelegram(alert: Alert): Promise<boolean> {
    const telegram = this.config.telegram;
    if (!telegram) return false;

    await this.post(
      `https://api.telegram.org/bot${telegram.botToken}/sendMessage`,
      "POST",
      {},
      { chat_id: telegram.chatId, text: alert.message },
      "Telegram"
    );
    console.log(`[AlertNotifier] Telegram message sent for ${alert.target}`);
    return true;
  }

  private async post(
    url: string,
    method: "POST" | "PUT",
    headers: Record<string, string>,
    body: unknown,
    label: string
  ): Promise<void> {
    const response = await this.fetchImpl(url, {
      method,
      headers: { "Content-Type": "application/json", ...headers },
      body: JSON.stringify(body),
    });
    await response.body?.cancel();

    if (!response.ok) {
      throw new Error(`${label} returned ${response.status}`);
    }
  }
}

// ============================================================================
// Factory Function
// ============================================================================

/**
 * Create an AlertNotifier from settings, with ALERT_* environment overrides
 */
export function createAlertNotifier(
  settings: AlertSettings,
  env: Env = process.env,
  options: AlertNotifierOptions = {}
): AlertNotifier {
  const config: AlertSettings = { ...settings, channels: [...settings.channels] };
  const enable = (channel: AlertChannel): void => {
    if (!config.channels.includes(channel)) {
      config.channels.push(channel);
    }
  };

  if (env.ALERT_SLACK_WEBHOOK) {
    config.slack = {
      webhookUrl: env.ALERT_SLACK_WEBHOOK,
      ...(env.ALERT_SLACK_CHANNEL ? { channel: env.ALERT_SLACK_CHANNEL } : {}),
      ...(env.ALERT_SLACK_USERNAME ? { username: env.ALERT_SLACK_USERNAME } : {}),
    };
    enable("slack");
  }

  if (env.ALERT_WEBHOOK_URL) {
    config.webhook = { url: env.ALERT_WEBHOOK_URL };
    enable("webhook");
  }

  if (env.ALERT_TELEGRAM_BOT_TOKEN && env.ALERT_TELEGRAM_CHAT_ID) {
    config.telegram = { botToken: env.ALERT_TELEGRAM_BOT_TOKEN, chatId: env.ALERT_TELEGRAM_CHAT_ID };
    enable("telegram");
  }

  if (env.ALERT_COOLDOWN) {
    const cooldown = parseInt(env.ALERT_COOLDOWN, 10);
    if (Number.isInteger(cooldown) && cooldown >= 0) {
      config.cooldownMs = cooldown;
    }
  }

  return new AlertNotifier(config, options);
}

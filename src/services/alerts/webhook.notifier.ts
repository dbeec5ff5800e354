import type { AlertPayload } from "../../types/rate";
import { createSignedWebhookHeaders } from "./signature";

interface NotifierLogger {
  info(payload: Record<string, unknown>, message: string): void;
  warn(payload: Record<string, unknown>, message: string): void;
  error(payload: Record<string, unknown>, message: string): void;
}

export interface DeliveryFailure {
  target: string;
  error: string;
}

export interface DeliveryReport {
  delivered: number;
  failures: DeliveryFailure[];
}

export interface AlertNotifier {
  send(alert: AlertPayload): Promise<DeliveryReport>;
}

export interface WebhookAlertNotifierOptions {
  webhookUrls: string[];
  logger: NotifierLogger;
  timeoutMs: number;
  signingPrivateKey?: string;
  fetchImpl?: typeof fetch;
}

/** Hides the query string, which often carries the webhook access token. */
export function redactWebhookUrl(raw: string): string {
  try {
    const url = new URL(raw);
    return `${url.origin}${url.pathname}`;
  } catch {
    return "<invalid url>";
  }
}

export class WebhookAlertNotifier implements AlertNotifier {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: WebhookAlertNotifierOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async send(alert: AlertPayload): Promise<DeliveryReport> {
    if (this.options.webhookUrls.length === 0) {
      this.options.logger.warn(
        { alert },
        "no alert webhooks configured; alert logged only",
      );
      return { delivered: 0, failures: [] };
    }

    const body = { type: "fx_rate_alert", alert };
    const report: DeliveryReport = { delivered: 0, failures: [] };

    for (const webhookUrl of this.options.webhookUrls) {
      const target = redactWebhookUrl(webhookUrl);
      try {
        await this.post(webhookUrl, body);
        report.delivered += 1;
        this.options.logger.info(
          { target, pair: alert.pair, kind: alert.kind },
          "rate alert delivered",
        );
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        report.failures.push({ target, error: message });
        this.options.logger.error(
          { target, pair: alert.pair, kind: alert.kind, error: message },
          "rate alert delivery failed",
        );
      }
    }

    return report;
  }

  private async post(webhookUrl: string, body: Record<string, unknown>): Promise<void> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      Accept: "application/json",
    };
    if (this.options.signingPrivateKey) {
      const signed = createSignedWebhookHeaders({
        url: webhookUrl,
        method: "POST",
        body,
        signingPrivateKeyBase64: this.options.signingPrivateKey,
      });
      Object.assign(headers, signed.headers);
    }

    const response = await this.fetchImpl(webhookUrl, {
      method: "POST",
      headers,
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(Math.max(500, this.options.timeoutMs)),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`Webhook responded with status ${response.status}: ${text.slice(0, 200)}`);
    }
  }
}

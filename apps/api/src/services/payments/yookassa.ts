import { z } from "zod";
import { DONATION_STATUSES } from "@awaken/shared";
import type { YookassaConfig } from "../../config.js";
import { ProviderError, type PaymentProvider } from "./types.js";

const API_BASE = "https://api.yookassa.ru/v3";

const paymentSchema = z.object({
  id: z.string().min(1),
  status: z.enum(DONATION_STATUSES),
  confirmation: z.object({ confirmation_url: z.string().url().optional() }).passthrough().optional()
});

export type YookassaOptions = YookassaConfig & { timeoutMs: number };

export function createYookassaProvider(opts: YookassaOptions): PaymentProvider {
  const auth = "Basic " + Buffer.from(`${opts.shopId}:${opts.secretKey}`).toString("base64");

  async function call(method: "GET" | "POST", path: string, body?: unknown, idempotenceKey?: string) {
    const ctrl = new AbortController();
    const t = setTimeout(() => ctrl.abort(), opts.timeoutMs);
    try {
      const headers: Record<string, string> = { Authorization: auth };
      if (body !== undefined) headers["Content-Type"] = "application/json";
      if (idempotenceKey) headers["Idempotence-Key"] = idempotenceKey;
      const res = await fetch(`${API_BASE}${path}`, {
        method,
        headers,
        ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
        signal: ctrl.signal
      });
      const text = await res.text();
      if (!res.ok) throw new ProviderError(`yookassa ${method} ${path} failed: ${res.status} ${text.slice(0, 200)}`);
      let json: unknown;
      try {
        json = text ? JSON.parse(text) : null;
      } catch (e) {
        throw new ProviderError(`yookassa ${method} ${path}: invalid JSON`, e);
      }
      const parsed = paymentSchema.safeParse(json);
      if (!parsed.success) throw new ProviderError(`yookassa ${method} ${path}: unexpected response`, parsed.error);
      return parsed.data;
    } catch (e) {
      if (e instanceof ProviderError) throw e;
      throw new ProviderError(`yookassa ${method} ${path}: ${e instanceof Error ? e.message : String(e)}`, e);
    } finally {
      clearTimeout(t);
    }
  }

  return {
    async createCheckout(req) {
      const payment = await call(
        "POST",
        "/payments",
        {
          amount: { value: req.amount.toFixed(2), currency: req.currency },
          confirmation: { type: "redirect", return_url: opts.returnUrl },
          capture: true,
          description: req.description,
          metadata: req.metadata
        },
        req.idempotenceKey
      );
      const checkoutUrl = payment.confirmation?.confirmation_url;
      if (!checkoutUrl) throw new ProviderError(`yookassa payment ${payment.id} has no confirmation_url`);
      return { paymentId: payment.id, checkoutUrl };
    },

    async getStatus(paymentId) {
      const payment = await call("GET", `/payments/${encodeURIComponent(paymentId)}`);
      return payment.status;
    }
  };
}

/** Stand-in for local runs without shop credentials: every checkout fails. */
export function createUnconfiguredProvider(): PaymentProvider {
  return {
    async createCheckout() {
      throw new ProviderError("payment provider is not configured (YOOKASSA_SHOP_ID / YOOKASSA_SECRET_KEY)");
    },
    async getStatus() {
      throw new ProviderError("payment provider is not configured (YOOKASSA_SHOP_ID / YOOKASSA_SECRET_KEY)");
    }
  };
}

import type { DonationStatus } from "@awaken/shared";

export type CheckoutRequest = {
  amount: number;
  currency: string;
  description: string;
  metadata: Record<string, string | number | boolean>;
  /** Same key for a retried request, so the provider does not mint a second payment. */
  idempotenceKey: string;
};

export type Checkout = { paymentId: string; checkoutUrl: string };

export class ProviderError extends Error {
  readonly code = "provider_unavailable" as const;
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "ProviderError";
  }
}

/** Payment provider boundary. Implementations throw ProviderError on any failure. */
export interface PaymentProvider {
  createCheckout(req: CheckoutRequest): Promise<Checkout>;
  getStatus(paymentId: string): Promise<DonationStatus>;
}

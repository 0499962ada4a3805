import { z } from "zod";
import type { Store } from "@shared/schema";
import { config } from "./config";
import { basicAuth, requestJson, withRetry } from "./http-client";

export interface StorefrontProduct {
  id: string;
  name: string;
  sku: string;
  status: string;
}

export interface StorefrontClient {
  findBySku(sku: string, signal?: AbortSignal): Promise<StorefrontProduct | null>;
  create(name: string, sku: string, price: number | null, signal?: AbortSignal): Promise<StorefrontProduct>;
}

const wooProductSchema = z
  .object({
    id: z.union([z.number(), z.string()]),
    name: z.string().default(""),
    sku: z.string().default(""),
    status: z.string().default(""),
  })
  .transform((p): StorefrontProduct => ({ ...p, id: String(p.id) }));

export class WooCommerceClient implements StorefrontClient {
  private readonly baseUrl: string;
  private readonly authHeader: string;

  constructor(
    store: Pick<Store, "storefrontUrl" | "storefrontKey" | "storefrontSecret">,
    private readonly timeoutMs: number = config.timeouts.storefrontMs,
  ) {
    this.baseUrl = `${store.storefrontUrl.replace(/\/+$/, "")}/wp-json/wc/v3`;
    this.authHeader = basicAuth(store.storefrontKey, store.storefrontSecret);
  }

  async findBySku(sku: string, signal?: AbortSignal): Promise<StorefrontProduct | null> {
    const url = `${this.baseUrl}/products?sku=${encodeURIComponent(sku)}`;
    const products = await withRetry(
      `WooCommerce products?sku=${sku}`,
      () =>
        requestJson("storefront", url, z.array(wooProductSchema), {
          headers: { Authorization: this.authHeader },
          timeoutMs: this.timeoutMs,
          signal,
        }),
      signal,
    );
    // The sku filter is a LIKE on some installs
    return products.find((p) => p.sku === sku) ?? null;
  }

  async create(name: string, sku: string, price: number | null, signal?: AbortSignal): Promise<StorefrontProduct> {
    return requestJson("storefront", `${this.baseUrl}/products`, wooProductSchema, {
      method: "POST",
      headers: { Authorization: this.authHeader },
      body: {
        name,
        sku,
        type: "simple",
        status: "draft",
        manage_stock: true,
        regular_price: price != null ? price.toFixed(2) : "",
      },
      timeoutMs: this.timeoutMs,
      signal,
    });
  }
}

export function isStorefrontConfigured(
  store: Pick<Store, "storefrontUrl" | "storefrontKey" | "storefrontSecret">,
): boolean {
  return !!(store.storefrontUrl && store.storefrontKey && store.storefrontSecret);
}

/**
 * ATUM Multi-Inventory client (WooCommerce REST extension, same site and
 * credentials as the storefront).
 *
 *   GET  /wp-json/wc/v3/atum/inventories?location=<id>&page=&per_page=100
 *   POST /wp-json/wc/v3/atum/inventories/batch  { create: [...], update: [...] }
 *
 * Create items carry `client_ref` (the local product id). Sites that echo it
 * back let the reconciler correlate without relying on display names.
 */

import { z } from "zod";
import type { Store } from "@shared/schema";
import { config } from "./config";
import { basicAuth, requestJson, withRetry } from "./http-client";
import type { BatchSubmission } from "./services/batch-planner";
import type { BatchResponse } from "./services/batch-reconciler";

export interface ExtensionItem {
  id: string;
  name: string;
  sku: string;
  stockQuantity: number;
}

export interface InventoryClient {
  fetchInventories(signal?: AbortSignal): Promise<ExtensionItem[]>;
  submitBatch(batch: BatchSubmission, signal?: AbortSignal): Promise<BatchResponse>;
}

const PER_PAGE = 100;

const idSchema = z.union([z.number(), z.string()]).transform(String);

const inventorySchema = z.object({
  id: idSchema,
  name: z.string().nullish(),
  meta_data: z
    .object({
      sku: z.string().nullish(),
      stock_quantity: z.number().nullish(),
    })
    .nullish(),
});

const remoteErrorSchema = z
  .object({ code: z.string().optional(), message: z.string().optional() })
  .nullish();

const batchResponseSchema = z.object({
  create: z
    .array(
      z.object({
        id: idSchema.nullish(),
        name: z.string().nullish(),
        client_ref: idSchema.nullish(),
        error: remoteErrorSchema,
      }),
    )
    .default([]),
  update: z
    .array(
      z.object({
        id: idSchema.nullish(),
        error: remoteErrorSchema,
      }),
    )
    .default([]),
});

type RemoteError = z.infer<typeof remoteErrorSchema>;

function describeError(error: RemoteError): string | undefined {
  if (!error) return undefined;
  return error.message || error.code || "Unknown ATUM error";
}

export class AtumClient implements InventoryClient {
  private readonly baseUrl: string;
  private readonly authHeader: string;

  constructor(
    private readonly store: Pick<
      Store,
      "id" | "storefrontUrl" | "storefrontKey" | "storefrontSecret" | "atumLocationId" | "atumLocationName"
    >,
    private readonly timeoutMs: number = config.timeouts.atumMs,
  ) {
    this.baseUrl = `${store.storefrontUrl.replace(/\/+$/, "")}/wp-json/wc/v3/atum/inventories`;
    this.authHeader = basicAuth(store.storefrontKey, store.storefrontSecret);
  }

  async fetchInventories(signal?: AbortSignal): Promise<ExtensionItem[]> {
    const items: ExtensionItem[] = [];

    for (let page = 1; ; page++) {
      const url = `${this.baseUrl}?location=${this.store.atumLocationId}&page=${page}&per_page=${PER_PAGE}`;
      const rows = await withRetry(
        `ATUM inventories page ${page}`,
        () =>
          requestJson("atum", url, z.array(inventorySchema), {
            headers: { Authorization: this.authHeader },
            timeoutMs: this.timeoutMs,
            signal,
          }),
        signal,
      );

      for (const row of rows) {
        items.push({
          id: row.id,
          name: row.name ?? "",
          sku: row.meta_data?.sku ?? "",
          stockQuantity: Math.trunc(row.meta_data?.stock_quantity ?? 0),
        });
      }

      if (rows.length < PER_PAGE) break;
    }

    console.log(`[ATUM] Store ${this.store.id}: fetched ${items.length} inventories`);
    return items;
  }

  async submitBatch(batch: BatchSubmission, signal?: AbortSignal): Promise<BatchResponse> {
    const body = {
      create: batch.create.map((item) => ({
        name: item.name,
        is_main: false,
        location: [this.store.atumLocationId],
        ...(/^\d+$/.test(item.storefrontId) ? { product_id: Number(item.storefrontId) } : {}),
        meta_data: {
          sku: item.sku,
          barcode: item.barcode,
          manage_stock: true,
          stock_quantity: item.stockQuantity,
          stock_status: item.stockQuantity > 0 ? "instock" : "outofstock",
        },
        client_ref: String(item.productId),
      })),
      update: batch.update.map((item) => ({
        id: Number(item.id),
        meta_data: {
          stock_quantity: item.stockQuantity,
          stock_status: item.stockQuantity > 0 ? "instock" : "outofstock",
        },
      })),
    };

    const response = await requestJson("atum", `${this.baseUrl}/batch`, batchResponseSchema, {
      method: "POST",
      headers: { Authorization: this.authHeader },
      body,
      timeoutMs: this.timeoutMs,
      signal,
    });

    return {
      create: response.create.map((r) => {
        const echo = r.client_ref != null ? Number(r.client_ref) : NaN;
        return {
          id: r.id ?? undefined,
          name: r.name ?? "",
          productIdEcho: Number.isInteger(echo) ? echo : undefined,
          error: describeError(r.error),
        };
      }),
      update: response.update.map((r) => ({
        id: r.id ?? "",
        error: describeError(r.error),
      })),
    };
  }
}

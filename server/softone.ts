import { z } from "zod";
import type { Store } from "@shared/schema";
import { config } from "./config";
import { requestJson, withRetry } from "./http-client";
import { validateErpResponse, type ErpListResponse } from "./services/field-extractor";

export interface ErpClient {
  fetchItems(signal?: AbortSignal): Promise<ErpListResponse>;
}

// Shape checks happen in validateErpResponse so `success: false` can be read
const rawBody = z.unknown();

/**
 * SoftOne Go `list/item` client. One POST returns the whole filtered item
 * list as column definitions + positional rows.
 */
export class SoftOneClient implements ErpClient {
  constructor(
    private readonly store: Pick<Store, "id" | "erpBaseUrl" | "erpAppId" | "erpToken" | "erpS1Code" | "erpFilters">,
    private readonly timeoutMs: number = config.timeouts.erpMs,
  ) {}

  async fetchItems(signal?: AbortSignal): Promise<ErpListResponse> {
    const url = `${this.store.erpBaseUrl.replace(/\/+$/, "")}/list/item`;

    const body = await withRetry(
      `ERP list/item (store ${this.store.id})`,
      () =>
        requestJson("erp", url, rawBody, {
          method: "POST",
          headers: { s1code: this.store.erpS1Code },
          body: {
            appId: this.store.erpAppId,
            filters: this.store.erpFilters,
            token: this.store.erpToken,
          },
          timeoutMs: this.timeoutMs,
          signal,
        }),
      signal,
    );

    const response = validateErpResponse(body);
    console.log(`[SoftOne] Store ${this.store.id}: received ${response.rows.length} rows`);
    return response;
  }
}

export function isErpConfigured(store: Pick<Store, "erpBaseUrl" | "erpAppId" | "erpToken">): boolean {
  return !!(store.erpBaseUrl && store.erpAppId && store.erpToken);
}

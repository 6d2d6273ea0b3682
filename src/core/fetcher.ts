import type { AxiosInstance } from "axios";
import type { FetchResult } from "../types";
import { FetchError } from "./errors";
import { type Pacer, getErrorMessage, getErrorStatus } from "./utils";

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Fetch a page's raw HTML after waiting for the pacer.
 * A single attempt; any failure is returned as a FetchError, never thrown.
 * The body is decoded as strict UTF-8, so undecodable bytes fail the fetch.
 * @param url - The page URL
 * @param http - Configured axios instance
 * @param pace - Politeness gate awaited before the request
 */
export async function fetchPage(
  url: string,
  http: AxiosInstance,
  pace: Pacer
): Promise<FetchResult> {
  try {
    await pace();
    const response = await http.get<unknown>(url, { responseType: "arraybuffer" });
    const body = response.data;
    if (!(body instanceof ArrayBuffer) && !(body instanceof Uint8Array)) {
      return {
        ok: false,
        error: new FetchError(url, "Response body is not text", response.status),
      };
    }

    let markup: string;
    try {
      markup = utf8.decode(body);
    } catch (decodeErr) {
      return {
        ok: false,
        error: new FetchError(url, "Response body is not valid UTF-8", response.status, decodeErr),
      };
    }
    return { ok: true, markup };
  } catch (err) {
    return {
      ok: false,
      error: new FetchError(url, getErrorMessage(err), getErrorStatus(err), err),
    };
  }
}

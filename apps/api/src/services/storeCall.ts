import { errorMessage, fail, ok, type Result } from "@awaken/shared";
import type { Logger } from "../logger.js";

/** Runs a store-backed step, turning any thrown store failure into `storage_unavailable`. */
export async function storeCall<T extends object>(
  log: Logger,
  op: string,
  fn: () => Promise<T>
): Promise<Result<T, "storage_unavailable">> {
  try {
    return ok(await fn());
  } catch (e) {
    log.error({ op, err: e }, "store call failed");
    return fail("storage_unavailable", errorMessage(e));
  }
}

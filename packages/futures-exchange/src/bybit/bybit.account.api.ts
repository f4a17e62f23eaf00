import { BYBIT_ACCOUNT_TYPE } from "./bybit.constants.js";
import { BybitRestClient } from "./bybit.rest.js";
import type { BybitListResult, BybitWalletRaw } from "./bybit.types.js";

export class BybitAccountApi {
  constructor(private readonly rest: BybitRestClient) {}

  getWalletBalance(accountType = BYBIT_ACCOUNT_TYPE): Promise<BybitListResult<BybitWalletRaw>> {
    return this.rest.requestPrivate({
      method: "GET",
      endpoint: "/v5/account/wallet-balance",
      query: { accountType }
    });
  }
}

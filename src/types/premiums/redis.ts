export interface RedisKeys {
  /** Latest computed premium record for a market */
  latestPremium: (asset: string, fiat: string, refFiat: string) => string;
}

export const RedisKey: RedisKeys = {
  latestPremium: (asset, fiat, refFiat) =>
    `premiums:latest:${asset}:${fiat}:${refFiat}`,
};

const MESSAGE_DOMAIN = 'VE:v1';

/** Message authorizing `delegatee` to receive the signer's votes */
export function buildDelegationMessage(delegatee: string, nonce: number, expiry: number): Uint8Array {
  return new TextEncoder().encode(`${MESSAGE_DOMAIN}:delegate:${delegatee}:${nonce}:${expiry}`);
}

/** Message proving control of `accountId` for one HTTP request */
export function buildRequestMessage(accountId: string, timestamp: string): Uint8Array {
  return new TextEncoder().encode(`${MESSAGE_DOMAIN}:${accountId}:${timestamp}`);
}

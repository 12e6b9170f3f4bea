import type { Address } from '../../core/domain/bridge.js';
import type { ITokenDirectory, TokenContract } from '../../core/ports/token-ledger.js';

/**
 * Address-keyed registry of the token contracts deployed on one domain.
 * Lookups ignore address casing.
 */
export class InMemoryTokenDirectory implements ITokenDirectory {
  private readonly contracts = new Map<string, TokenContract>();

  register(contract: TokenContract): this {
    this.contracts.set(contract.address.toLowerCase(), contract);
    return this;
  }

  async lookup(address: Address): Promise<TokenContract | null> {
    return this.contracts.get(address.toLowerCase()) ?? null;
  }
}

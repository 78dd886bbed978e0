import { ConstructionError, ErrorHandler } from '../errors/ErrorHandler';
import { Logger } from '../monitoring/observability/logger';
import { generateAuthKey, KeyStore } from '../security/KeyStore';
import { Account, StorageMode } from '../types/Account';
import { FungibleAsset } from '../types/Asset';
import { LedgerClient } from '../types/Ledger';
import { validateAssetAmount } from '../utils/asset';
import { defaultRandomSource, RandomSource } from '../utils/random';
import { LedgerStateView } from './LedgerStateView';

const SYMBOL_PATTERN = /^[A-Z]{1,6}$/;
const MAX_DECIMALS = 12;

/**
 * Creates wallets and faucets on the ledger and keeps their signing keys in
 * the key store.
 */
export class AccountProvisioner {
  private readonly errorHandler = ErrorHandler.getInstance();
  private readonly logger = Logger.getInstance().child({ component: 'account-provisioner' });

  constructor(
    private readonly ledger: LedgerClient,
    private readonly keyStore: KeyStore,
    private readonly state: LedgerStateView,
    private readonly random: RandomSource = defaultRandomSource
  ) {}

  async createWallet(storageMode: StorageMode = 'private'): Promise<Account> {
    const key = generateAuthKey(this.random);
    let account: Account;
    try {
      account = await this.ledger.createAccount({
        type: 'regular',
        storageMode,
        authPublicKey: key.publicKey
      });
    } catch (error) {
      throw this.errorHandler.handleError(error, { operation: 'createWallet' });
    }
    await this.keyStore.addKey(account.id, key);
    this.logger.info('Wallet created', { accountId: account.id.toHex(), storageMode });
    return account;
  }

  async deployFaucet(symbol: string, decimals: number, maxSupply: bigint): Promise<Account> {
    if (!SYMBOL_PATTERN.test(symbol)) {
      throw new ConstructionError(`Token symbol must be 1-6 upper-case letters, got "${symbol}"`, { symbol });
    }
    if (!Number.isInteger(decimals) || decimals < 0 || decimals > MAX_DECIMALS) {
      throw new ConstructionError(`Decimals must be an integer in [0, ${MAX_DECIMALS}], got ${decimals}`, { decimals });
    }
    validateAssetAmount(maxSupply);

    const key = generateAuthKey(this.random);
    let account: Account;
    try {
      account = await this.ledger.createAccount({
        type: 'fungible-faucet',
        storageMode: 'public',
        authPublicKey: key.publicKey,
        faucet: { symbol, decimals, maxSupply }
      });
    } catch (error) {
      throw this.errorHandler.handleError(error, { operation: 'deployFaucet', symbol });
    }
    await this.keyStore.addKey(account.id, key);
    this.logger.info('Faucet deployed', { accountId: account.id.toHex(), symbol, decimals, maxSupply });
    return account;
  }

  /**
   * Issues `amount` from `faucet` to `target` and re-synchronizes
   */
  async mint(faucet: Account, target: Account, amount: bigint): Promise<FungibleAsset> {
    let asset: FungibleAsset;
    try {
      asset = await this.ledger.issueAsset(faucet.id, target.id, amount);
    } catch (error) {
      throw this.errorHandler.handleError(error, {
        operation: 'mint',
        accountId: target.id.toHex(),
        faucetId: faucet.id.toHex()
      });
    }
    await this.state.refresh();
    this.logger.info('Minted', {
      faucetId: faucet.id.toHex(),
      target: target.id.toHex(),
      amount
    });
    return asset;
  }
}

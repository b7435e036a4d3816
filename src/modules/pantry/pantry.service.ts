import type { Cart } from '../../connections/db/models/cart-item.model';
import type { CreateProductInput, Product } from '../../connections/db/models/product.model';
import type { HistoryEvent, HistoryEventKind } from '../../connections/db/models/history-event.model';
import type { PantrySnapshot } from '../../connections/db/models/pantry-snapshot.model';
import type { HistoryRetention } from '../../connections/config/app.config';
import type { Clock } from '../../utils/clock';
import { NotFoundError, StoreUnavailableError } from '../../utils/errors';
import { getLogger } from '../../utils/logging';
import type { PantryStore } from '../store/store.types';
import { estimateConsumption, type ConsumptionEstimate } from '../consumption/consumption.service';
import {
  buildShoppingList,
  planReplenishment,
  type ShoppingList,
  type Suggestion,
} from '../replenishment/replenishment.service';
import { commitCart, type CommitOutcome } from '../checkout/checkout.service';
import { applyAudit, listHistory, type AuditOutcome } from '../inventory/inventory.service';
import { deleteProduct, registerProduct, type DeleteOutcome, type RegisterOutcome } from '../products/products.service';

const log = getLogger('pantry');

/**
 * Read result. On a store failure `data` is built from empty collections
 * and `connectionError` says why.
 */
export interface ReadResult<T> {
  data: T;
  connectionError: string | null;
}

export interface ProductSuggestion {
  product: Product;
  estimate: ConsumptionEstimate | null;
  suggestion: Suggestion;
}

export interface PantryServiceOptions {
  historyRetention: HistoryRetention;
}

/**
 * One interaction per call: load a complete snapshot, run one core
 * operation, save both collections back whole.
 */
export class PantryService {
  constructor(
    private readonly store: PantryStore,
    private readonly clock: Clock,
    private readonly options: PantryServiceOptions
  ) {}

  private async read<T>(project: (snapshot: PantrySnapshot) => T): Promise<ReadResult<T>> {
    const { error, ...snapshot } = await this.store.load();
    if (error) {
      log.warn('Serving empty pantry after store failure', { error: error.message });
    }
    return { data: project(snapshot), connectionError: error ? error.message : null };
  }

  private async loadOrFail(): Promise<PantrySnapshot> {
    const { error, ...snapshot } = await this.store.load();
    if (error) {
      throw new StoreUnavailableError('Pantry store is unavailable, nothing was changed', {
        reason: error.message,
      });
    }
    return snapshot;
  }

  listProducts(): Promise<ReadResult<Product[]>> {
    return this.read(snapshot => snapshot.products);
  }

  shoppingList(): Promise<ReadResult<ShoppingList>> {
    return this.read(buildShoppingList);
  }

  async productSuggestion(productId: number): Promise<ProductSuggestion> {
    const snapshot = await this.loadOrFail();
    const product = snapshot.products.find(candidate => candidate.id === productId);
    if (!product) {
      throw new NotFoundError(`Product ${productId} not found`);
    }
    const estimate = estimateConsumption(productId, snapshot.history);
    return {
      product,
      estimate,
      suggestion: planReplenishment(product, estimate ? estimate.monthly_rate : null),
    };
  }

  history(filter: { productId?: number; kind?: HistoryEventKind } = {}): Promise<ReadResult<HistoryEvent[]>> {
    return this.read(snapshot => listHistory(snapshot.history, filter));
  }

  async getProduct(productId: number): Promise<Product> {
    const snapshot = await this.loadOrFail();
    const product = snapshot.products.find(candidate => candidate.id === productId);
    if (!product) {
      throw new NotFoundError(`Product ${productId} not found`);
    }
    return product;
  }

  async registerProduct(input: CreateProductInput): Promise<RegisterOutcome> {
    const snapshot = await this.loadOrFail();
    const outcome = registerProduct(snapshot, input, this.clock.now());
    await this.store.save({ products: outcome.products, history: outcome.history });
    log.info('Registered product', { id: outcome.product.id, name: outcome.product.name });
    return outcome;
  }

  async deleteProduct(productId: number): Promise<DeleteOutcome> {
    const snapshot = await this.loadOrFail();
    const outcome = deleteProduct(snapshot, productId, this.options.historyRetention);
    await this.store.save({ products: outcome.products, history: outcome.history });
    log.info('Deleted product', { id: productId, discardedEvents: outcome.discarded_events });
    return outcome;
  }

  async applyAudit(counts: ReadonlyMap<number, number>): Promise<AuditOutcome> {
    const snapshot = await this.loadOrFail();
    const outcome = applyAudit(snapshot, counts, this.clock.now());
    if (outcome.changed) {
      await this.store.save({ products: outcome.products, history: outcome.history });
      log.info('Recorded stock counts', { events: outcome.appended.length });
    }
    return outcome;
  }

  /**
   * Stock update and PURCHASE events reach the store in one save.
   */
  async checkout(cart: Cart): Promise<CommitOutcome> {
    const snapshot = await this.loadOrFail();
    const outcome = commitCart(snapshot, cart, this.clock.now());
    if (outcome.status === 'committed') {
      await this.store.save({ products: outcome.products, history: outcome.history });
      log.info('Committed purchase', { events: outcome.appended.length });
    }
    return outcome;
  }
}

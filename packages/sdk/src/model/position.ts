import type { ISODate } from "./types.js";

/**
 * Quantity opened at one price. Signed like the position it belongs to.
 */
export interface Lot {
  readonly quantity: number;
  readonly price: number;
  readonly date: ISODate;
}

interface OpenLot {
  quantity: number;
  readonly price: number;
  readonly date: ISODate;
}

// Residues below this are rounding noise from fractional share arithmetic.
const QUANTITY_EPSILON = 1e-9;

/**
 * Open position in one symbol, accounted lot by lot.
 *
 * Fills in the direction of the position add a lot. Fills against it close the
 * oldest lots first and realize P&L per lot; whatever is left after every lot
 * is closed opens a position in the other direction.
 */
export class Position {
  public readonly symbol: string;

  private readonly lots: OpenLot[] = [];
  private mark: number;
  private realized = 0;
  private openedOn: ISODate;

  public constructor(symbol: string, quantity: number, price: number, date: ISODate) {
    this.symbol = symbol;
    this.mark = price;
    this.openedOn = date;
    if (quantity !== 0) {
      this.lots.push({ quantity, price, date });
    }
  }

  /** Signed quantity; positive is long. */
  public get quantity(): number {
    return this.lots.reduce((sum, lot) => sum + lot.quantity, 0);
  }

  /** Quantity-weighted entry price of the open lots, 0 when flat. */
  public get averageEntryPrice(): number {
    let size = 0;
    let cost = 0;
    for (const lot of this.lots) {
      const lotSize = Math.abs(lot.quantity);
      size += lotSize;
      cost += lotSize * lot.price;
    }
    return size === 0 ? 0 : cost / size;
  }

  /** Date the current direction was opened. */
  public get entryDate(): ISODate {
    return this.openedOn;
  }

  public get currentPrice(): number {
    return this.mark;
  }

  /** Cumulative P&L realized by closing fills. */
  public get realizedPnl(): number {
    return this.realized;
  }

  public get unrealizedPnl(): number {
    return this.quantity * (this.mark - this.averageEntryPrice);
  }

  public get marketValue(): number {
    return this.quantity * this.mark;
  }

  public isFlat(): boolean {
    return this.lots.length === 0;
  }

  public getLots(): ReadonlyArray<Lot> {
    return this.lots.map((lot) => ({ ...lot }));
  }

  public markToMarket(price: number): void {
    this.mark = price;
  }

  /**
   * Applies a fill of `quantityDelta` (signed) at `price` and returns the P&L it realized.
   */
  public apply(quantityDelta: number, price: number, date: ISODate): number {
    this.mark = price;
    if (quantityDelta === 0) {
      return 0;
    }

    const direction = Math.sign(quantityDelta);
    const current = this.quantity;
    if (this.lots.length === 0 || Math.sign(current) === direction) {
      if (this.lots.length === 0) {
        this.openedOn = date;
      }
      this.lots.push({ quantity: quantityDelta, price, date });
      return 0;
    }

    let remaining = Math.abs(quantityDelta);
    let realized = 0;
    while (remaining > QUANTITY_EPSILON) {
      const lot = this.lots[0];
      if (!lot) {
        break;
      }
      const lotSide = Math.sign(lot.quantity);
      const lotSize = Math.abs(lot.quantity);
      const closed = Math.min(lotSize, remaining);
      realized += closed * (price - lot.price) * lotSide;
      remaining -= closed;
      if (lotSize - closed <= QUANTITY_EPSILON) {
        this.lots.shift();
      } else {
        lot.quantity -= closed * lotSide;
      }
    }

    if (remaining > QUANTITY_EPSILON) {
      this.lots.push({ quantity: remaining * direction, price, date });
      this.openedOn = date;
    }

    this.realized += realized;
    return realized;
  }
}

import type { Cart, CartView, Catalog, Totals } from '../domain/models.js';

export const NAME_WIDTH = 20;
export const QTY_WIDTH = 5;
export const MONEY_WIDTH = 12;

const TABLE_WIDTH = NAME_WIDTH + QTY_WIDTH + MONEY_WIDTH * 2;

export interface InvoiceOptions {
  currency?: string;
  invoiceId?: string;
}

export function formatMoney(amount: number, currency: string = '$'): string {
  return `${currency}${amount.toFixed(2)}`;
}

function itemRow(name: string, qty: string, first: string, second: string): string {
  return (
    name.padEnd(NAME_WIDTH) +
    qty.padStart(QTY_WIDTH) +
    first.padStart(MONEY_WIDTH) +
    second.padStart(MONEY_WIDTH)
  );
}

function summaryRow(label: string, value: string): string {
  return label.padEnd(TABLE_WIDTH - MONEY_WIDTH) + value.padStart(MONEY_WIDTH);
}

export function renderCatalog(catalog: Catalog, currency: string = '$'): string[] {
  if (catalog.size === 0) return ['No products available.'];

  const rule = '-'.repeat(NAME_WIDTH + MONEY_WIDTH);
  const lines = [
    'Available Products',
    rule,
    'Product'.padEnd(NAME_WIDTH) + 'Price'.padStart(MONEY_WIDTH),
    rule,
  ];

  for (const [name, price] of catalog) {
    lines.push(name.padEnd(NAME_WIDTH) + formatMoney(price, currency).padStart(MONEY_WIDTH));
  }

  return lines;
}

// entries whose product has left the catalog are skipped silently
export function renderCart(cart: Cart, catalog: Catalog, currency: string = '$'): CartView {
  if (cart.size === 0) return { lines: ['Your cart is empty.'], total: 0 };

  const rule = '-'.repeat(TABLE_WIDTH);
  const lines = [
    'Your Cart',
    rule,
    itemRow('Product', 'Qty', 'Unit Price', 'Subtotal'),
    rule,
  ];
  let total = 0;

  for (const [name, quantity] of cart) {
    const unitPrice = catalog.get(name);
    if (unitPrice === undefined) continue;

    const subtotal = unitPrice * quantity;
    total += subtotal;
    lines.push(
      itemRow(name, String(quantity), formatMoney(unitPrice, currency), formatMoney(subtotal, currency))
    );
  }

  lines.push(rule, summaryRow('Total', formatMoney(total, currency)));
  return { lines, total };
}

export function renderInvoice(totals: Totals, options: InvoiceOptions = {}): string[] {
  const currency = options.currency ?? '$';
  const heavy = '='.repeat(TABLE_WIDTH);
  const rule = '-'.repeat(TABLE_WIDTH);

  const lines = [heavy, 'INVOICE'];
  if (options.invoiceId) lines.push(`Invoice #: ${options.invoiceId}`);
  lines.push(heavy, itemRow('Product', 'Qty', 'Unit Price', 'Amount Due'), rule);

  for (const line of totals.lines) {
    lines.push(
      itemRow(
        line.productName,
        String(line.quantity),
        formatMoney(line.unitPrice, currency),
        formatMoney(line.amountDue, currency)
      )
    );
  }

  lines.push(rule, 'Discounts applied:');
  if (totals.discounts.length === 0) {
    lines.push('  No discounts applied.');
  }
  for (const d of totals.discounts) {
    lines.push(
      `  ${d.productName}: ${d.freeUnits} free of ${d.quantity} (saved ${formatMoney(d.savings, currency)})`
    );
  }

  lines.push(
    rule,
    summaryRow('Subtotal', formatMoney(totals.subtotal, currency)),
    summaryRow('Savings', formatMoney(totals.subtotal - totals.grandTotal, currency)),
    summaryRow('Total', formatMoney(totals.grandTotal, currency)),
    heavy
  );

  return lines;
}

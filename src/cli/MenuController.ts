import { v4 as uuidv4 } from 'uuid';
import type { IConsoleIO } from '../infrastructure/io/IConsoleIO.js';
import type { ShoppingSession } from '../domain/session.js';
import { DomainError } from '../domain/errors/index.js';
import { renderCart, renderCatalog, renderInvoice } from '../presentation/renderers.js';

export type MenuState =
  | 'MainMenu'
  | 'Catalog'
  | 'AddToCart'
  | 'ViewCart'
  | 'UpdateCart'
  | 'Checkout'
  | 'Exit';

const MENU_CHOICES: ReadonlyArray<[label: string, state: MenuState]> = [
  ['View Products', 'Catalog'],
  ['Add Item', 'AddToCart'],
  ['View Cart', 'ViewCart'],
  ['Update/Remove Item', 'UpdateCart'],
  ['Checkout', 'Checkout'],
  ['Exit', 'Exit'],
];

const INTEGER_PATTERN = /^[+-]?\d+$/;

function isYes(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === 'y' || normalized === 'yes';
}

// one session's menu loop; domain errors are reported here, anything else propagates
export class MenuController {
  constructor(
    private readonly io: IConsoleIO,
    private readonly session: ShoppingSession
  ) {}

  async run(): Promise<void> {
    let state: MenuState = 'MainMenu';
    while (state !== 'Exit') {
      state = await this.step(state);
    }
    this.io.print('Goodbye!');
  }

  async step(state: MenuState): Promise<MenuState> {
    switch (state) {
      case 'MainMenu':
        return this.mainMenu();
      case 'Catalog':
        this.showCatalog();
        return 'MainMenu';
      case 'AddToCart':
        return this.addToCart();
      case 'ViewCart':
        this.showCart();
        return 'MainMenu';
      case 'UpdateCart':
        return this.updateCart();
      case 'Checkout':
        this.checkout();
        return 'MainMenu';
      case 'Exit':
        return 'Exit';
    }
  }

  private async mainMenu(): Promise<MenuState> {
    this.io.print();
    this.io.print('=== Main Menu ===');
    MENU_CHOICES.forEach(([label], idx) => this.io.print(`${idx + 1}. ${label}`));

    for (;;) {
      const choice = await this.readInteger(`Enter your choice (1-${MENU_CHOICES.length}): `);
      if (choice === null) return 'Exit';

      const entry = MENU_CHOICES[choice - 1];
      if (choice >= 1 && entry !== undefined) {
        const [, next] = entry;
        return next === 'Exit' ? this.confirmExit() : next;
      }
      this.io.print(`Please choose a number between 1 and ${MENU_CHOICES.length}.`);
    }
  }

  private showCatalog(): void {
    renderCatalog(this.session.catalog, this.session.currency).forEach(line => this.io.print(line));
  }

  private showCart(): void {
    const { lines } = renderCart(this.session.cart, this.session.catalog, this.session.currency);
    lines.forEach(line => this.io.print(line));
  }

  private async addToCart(): Promise<MenuState> {
    const { cart, cartService } = this.session;

    for (;;) {
      const name = await this.io.prompt('Enter product name (blank to cancel): ');
      if (name === null) return 'Exit';
      if (name.trim() === '') return 'MainMenu';

      let productName: string;
      try {
        productName = cartService.resolveProduct(name);
      } catch (err) {
        this.report(err);
        continue;
      }

      for (;;) {
        const quantity = await this.readInteger('Enter quantity: ');
        if (quantity === null) return 'Exit';
        try {
          const total = cartService.addItem(cart, productName, quantity);
          this.io.print(`Added ${quantity} x ${productName} to your cart (now ${total}).`);
          break;
        } catch (err) {
          this.report(err);
        }
      }

      const again = await this.io.prompt('Add another item? (y/n): ');
      if (again === null) return 'Exit';
      if (!isYes(again)) return 'MainMenu';
    }
  }

  private async updateCart(): Promise<MenuState> {
    const { cart, cartService } = this.session;

    if (cart.size === 0) {
      this.io.print('Your cart is empty.');
      return 'MainMenu';
    }

    this.showCart();
    const name = await this.io.prompt('Enter product name to update (blank to cancel): ');
    if (name === null) return 'Exit';
    if (name.trim() === '') return 'MainMenu';

    let productName: string;
    try {
      productName = cartService.requireInCart(cart, name);
    } catch (err) {
      this.report(err);
      return 'MainMenu';
    }

    for (;;) {
      const quantity = await this.readInteger('Enter new quantity (0 to remove): ');
      if (quantity === null) return 'Exit';
      try {
        const left = cartService.updateItem(cart, productName, quantity);
        this.io.print(
          left === 0
            ? `Removed ${productName} from your cart.`
            : `Updated ${productName} to ${left}.`
        );
        return 'MainMenu';
      } catch (err) {
        this.report(err);
      }
    }
  }

  private checkout(): void {
    const { cart, cartService, totals, currency, logger } = this.session;

    if (cart.size === 0) {
      this.io.print('Your cart is empty. Nothing to check out.');
      return;
    }

    const invoiceId = uuidv4();
    const result = totals.computeTotal(cart);
    renderInvoice(result, { currency, invoiceId }).forEach(line => this.io.print(line));

    logger.info({ invoiceId, grandTotal: result.grandTotal }, 'checkout complete');
    cartService.clearCart(cart);
    this.io.print('Thank you for your purchase!');
  }

  private async confirmExit(): Promise<MenuState> {
    if (this.session.cart.size === 0) return 'Exit';

    const answer = await this.io.prompt('Your cart is not empty. Exit anyway? (y/n): ');
    if (answer === null || isYes(answer)) return 'Exit';
    return 'MainMenu';
  }

  // re-prompts until the line parses as an integer; null on end of input
  private async readInteger(question: string): Promise<number | null> {
    for (;;) {
      const answer = await this.io.prompt(question);
      if (answer === null) return null;

      const trimmed = answer.trim();
      if (INTEGER_PATTERN.test(trimmed)) return Number.parseInt(trimmed, 10);
      this.io.print('Please enter a whole number.');
    }
  }

  private report(err: unknown): void {
    if (!(err instanceof DomainError)) throw err;
    this.session.logger.debug({ code: err.code }, err.message);
    this.io.print(err.message);
  }
}

import { QuoteService } from "../src/services/quoteService";
import { selectionOf, silentLogger } from "./helpers";

test('quotes a selection at full precision', () => {
  const service = new QuoteService(silentLogger(), () => 'q-1');
  const selection = selectionOf({ permitType: 'COMMUTER', vehicleType: 'SUV', carpool: true, months: 3 });
  const quote = service.quote(selection);

  expect(quote.id).toBe('q-1');
  expect(quote.selection).toBe(selection);
  expect(quote.monthlyRate.toString()).toBe('30.79125');
  expect(quote.subtotal.toString()).toBe('92.37375');
  expect(quote.campusFee.toString()).toBe('4.6186875');
  expect(quote.total.toString()).toBe('96.9924375');
});

test('each quote gets its own uuid by default', () => {
  const service = new QuoteService(silentLogger());
  const selection = selectionOf({ permitType: 'RESIDENT', vehicleType: 'CAR', carpool: false, months: 1 });
  const first = service.quote(selection);
  const second = service.quote(selection);

  expect(first.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  expect(second.id).not.toBe(first.id);
  expect(second.total.equals(first.total)).toBe(true);
});

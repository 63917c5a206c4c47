import { Decimal } from "decimal.js";
import { IRateModifier } from "../src/interfaces/rateModifier";
import { CARPOOL_DISCOUNT, vehicleModifier } from "../src/services/rateModifiers";
import { ModifierPipeline } from "../src/services/modifierPipeline";
import { selectionOf } from "./helpers";

const plusTen: IRateModifier = { apply: (rate) => rate.plus(10) };
const double: IRateModifier = { apply: (rate) => rate.times(2) };

test('vehicle modifiers scale the monthly rate', () => {
  const rate = new Decimal(100);
  expect(vehicleModifier('CAR').apply(rate).toString()).toBe('100');
  expect(vehicleModifier('SUV').apply(rate).toString()).toBe('115');
  expect(vehicleModifier('MOTORCYCLE').apply(rate).toString()).toBe('70');
});

test('carpool discount takes 10% off', () => {
  expect(CARPOOL_DISCOUNT.apply(new Decimal(45)).toString()).toBe('40.5');
});

test('empty pipeline returns the rate unchanged', () => {
  const rate = new Decimal('29.75');
  expect(new ModifierPipeline().applyAll(rate).toString()).toBe('29.75');
});

test('pipeline applies modifiers left to right', () => {
  expect(new ModifierPipeline([plusTen, double]).applyAll(new Decimal(5)).toString()).toBe('30');
  expect(new ModifierPipeline([double, plusTen]).applyAll(new Decimal(5)).toString()).toBe('20');
});

test('suv then carpool multiplies by 1.15 and 0.90', () => {
  const pipeline = new ModifierPipeline([vehicleModifier('SUV'), CARPOOL_DISCOUNT]);
  expect(pipeline.applyAll(new Decimal('29.75')).toString()).toBe('30.79125');
});

test('pipeline for a selection adds carpool only when requested', () => {
  const solo = selectionOf({ permitType: 'RESIDENT', vehicleType: 'SUV', carpool: false, months: 1 });
  const shared = selectionOf({ permitType: 'RESIDENT', vehicleType: 'SUV', carpool: true, months: 1 });
  expect(ModifierPipeline.forSelection(solo).applyAll(new Decimal(45)).toString()).toBe('51.75');
  expect(ModifierPipeline.forSelection(shared).applyAll(new Decimal(45)).toString()).toBe('46.575');
});

/**
 * Fixed enumerations shared by the catalog tables and the ledgers.
 */

export const CATEGORIES = ["Home Delivery", "Frozen Products", "SFH"] as const;

export const SUBCATEGORIES = [
  "Infrastructure",
  "Meat and Fish",
  "Veggies",
  "Grocery",
  "Dairy",
  "Bakery",
  "Kitchen Tool",
  "Fuel",
  "Serving Dish",
  "Operating Supplies",
  "Packaging",
] as const;

export const PAYMENT_STATUSES = ["Live", "Due", "Paid"] as const;

export const PAYMENT_MODES = [
  "CurrentUPI",
  "Cash",
  "Card",
  "PersonalUPI",
  "PersonalCash",
] as const;

export type Category = (typeof CATEGORIES)[number];
export type Subcategory = (typeof SUBCATEGORIES)[number];
export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];
export type PaymentMode = (typeof PAYMENT_MODES)[number];

import type { SaleRow } from "@/lib/store/schema";

const RULE = "-".repeat(40);

/**
 * Plain-text bill for one sale line. The browser saves or prints it;
 * optional lines are left out when their fields are blank.
 */
export function formatBill(sale: SaleRow, title = "Bill"): string {
  const lines: string[] = [title];
  lines.push(`Date: ${sale.date}    Order: #${sale.order_id}`);
  if (sale.category) lines.push(`Category: ${sale.category}`);
  if (sale.branch) lines.push(`Branch: ${sale.branch}`);
  if (sale.table_no) lines.push(`Table: ${sale.table_no}`);
  lines.push(RULE);
  lines.push(`Item: ${sale.item}  (${sale.unit})`);
  lines.push(`Qty: ${sale.qty}  Unit Price: ₹${sale.unit_price}`);
  lines.push(`Discount: ₹${sale.discount}`);
  lines.push(`Total: ₹${sale.total_price}`);
  lines.push(RULE);
  if (sale.customer_name || sale.customer_phone) {
    lines.push(`Customer: ${sale.customer_name}  ${sale.customer_phone}`);
  }
  lines.push(`Payment: ${sale.payment_status} ${sale.payment_mode}`);
  if (sale.payment_note) lines.push(`Note: ${sale.payment_note}`);
  if (sale.notes) lines.push(`Remarks: ${sale.notes}`);
  return lines.join("\n");
}

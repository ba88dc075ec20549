import { Bill } from '../types';

// Monthly bill for `yyyy-MM`, covering the whole month
export function monthlyBill(billId: string, month: string, amount: number, lineItems: Bill['lineItems'] = []): Omit<Bill, 'userId'> {
  const [year, monthNumber] = month.split('-').map(Number);
  const lastDay = new Date(Date.UTC(year, monthNumber, 0)).getUTCDate();
  return {
    billId,
    periodStart: `${month}-01`,
    periodEnd: `${month}-${String(lastDay).padStart(2, '0')}`,
    amount,
    lineItems,
  };
}

// Oldest first: 80, 95, 110, 90, 200
export function fiveMonthHistory(): Array<Omit<Bill, 'userId'>> {
  return [
    monthlyBill('b1', '2024-01', 80),
    monthlyBill('b2', '2024-02', 95),
    monthlyBill('b3', '2024-03', 110),
    monthlyBill('b4', '2024-04', 90),
    monthlyBill('b5', '2024-05', 200),
  ];
}

export { CATEGORY_ALIASES, aliasesFor, resolveCategory } from "./categories";
export {
  SPENDING_TOOLS,
  compareSpending,
  formatNok,
  getAverageSpending,
  getTotalSpending,
  listCategories,
  registerSpendingTools,
  resolvePeriod,
  spendingFor,
} from "./spendingTools";
export type { CategorySpending, SpendingComparison, TotalSpending } from "./spendingTools";

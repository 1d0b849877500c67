export {
  type AggregateSpec,
  aggregate,
  parseReducer,
  type Reducer,
} from "./aggregate.js";
export { column, project, rowItems } from "./columns.js";
export { distinct } from "./distinct.js";
export { join } from "./join.js";
export { limit, type OrderBySpec, orderBy } from "./order-by.js";

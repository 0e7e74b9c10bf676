import { and, count, eq, lt, notExists, sql, type SQL } from "drizzle-orm";
import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";

import type { CustomerRepository, InactiveCustomerCriteria } from "../interface/CustomerRepository";
import { CustomerRepositoryError } from "../errors/CustomerRepositoryError";
import { customers, orders } from "./schema";

export class CustomerDrizzleRepository implements CustomerRepository {
  constructor(private readonly db: PostgresJsDatabase) {}

  async deleteInactiveCustomers(criteria: InactiveCustomerCriteria): Promise<number> {
    try {
      // One statement, so the selection and the delete cannot diverge
      const result = await this.db.delete(customers).where(this.inactiveCustomerFilter(criteria));
      return result.count;
    } catch (error) {
      throw CustomerRepositoryError.fromDatabaseError(error, "inactive customer delete");
    }
  }

  async countInactiveCustomers(criteria: InactiveCustomerCriteria): Promise<number> {
    try {
      const [result] = await this.db
        .select({ count: count() })
        .from(customers)
        .where(this.inactiveCustomerFilter(criteria));
      return result?.count ?? 0;
    } catch (error) {
      throw CustomerRepositoryError.fromDatabaseError(error, "inactive customer count");
    }
  }

  async ping(): Promise<void> {
    try {
      await this.db.execute(sql`select 1`);
    } catch (error) {
      throw CustomerRepositoryError.fromDatabaseError(error, "ping");
    }
  }

  private inactiveCustomerFilter(criteria: InactiveCustomerCriteria): SQL | undefined {
    return and(
      lt(customers.created, criteria.createdBefore),
      notExists(
        this.db
          .select({ id: orders.id })
          .from(orders)
          .where(eq(orders.customerId, customers.id)),
      ),
    );
  }
}

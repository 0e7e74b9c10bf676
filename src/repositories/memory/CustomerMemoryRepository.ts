import {
  isInactiveCustomer,
  type CustomerRepository,
  type ICustomer,
  type InactiveCustomerCriteria,
  type IOrder,
} from "../interface/CustomerRepository";
import { CustomerRepositoryError, CustomerRepositoryErrorType } from "../errors/CustomerRepositoryError";

export interface CustomerMemorySeed {
  customers?: ICustomer[];
  orders?: IOrder[];
}

/**
 * In-process customer store. Stands in for PostgreSQL in tests.
 */
export class CustomerMemoryRepository implements CustomerRepository {
  private customers: ICustomer[];
  private readonly orders: IOrder[];
  private reachable = true;

  constructor(seed: CustomerMemorySeed = {}) {
    this.customers = [...(seed.customers ?? [])];
    this.orders = [...(seed.orders ?? [])];
  }

  /**
   * Simulate the store going away: every call rejects with a connection failure
   */
  setReachable(reachable: boolean): void {
    this.reachable = reachable;
  }

  listCustomers(): ICustomer[] {
    return [...this.customers];
  }

  async deleteInactiveCustomers(criteria: InactiveCustomerCriteria): Promise<number> {
    this.assertReachable("inactive customer delete");
    const before = this.customers.length;
    this.customers = this.customers.filter((customer) => !this.matches(customer, criteria));
    return before - this.customers.length;
  }

  async countInactiveCustomers(criteria: InactiveCustomerCriteria): Promise<number> {
    this.assertReachable("inactive customer count");
    return this.customers.filter((customer) => this.matches(customer, criteria)).length;
  }

  async ping(): Promise<void> {
    this.assertReachable("ping");
  }

  private matches(customer: ICustomer, criteria: InactiveCustomerCriteria): boolean {
    const orderCount = this.orders.filter((order) => order.customerId === customer.id).length;
    return isInactiveCustomer(customer, orderCount, criteria);
  }

  private assertReachable(context: string): void {
    if (!this.reachable) {
      throw new CustomerRepositoryError(CustomerRepositoryErrorType.CONNECTION_FAILED, context, "ECONNREFUSED");
    }
  }
}

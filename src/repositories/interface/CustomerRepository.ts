/**
 * Selection for the retention sweep. Customers with any order are never matched,
 * so the only tunable part is the creation cutoff.
 */
export interface InactiveCustomerCriteria {
  createdBefore: Date;
}

export interface ICustomer {
  id: number;
  name: string;
  email: string;
  phone: string | null;
  created: Date;
}

export interface IOrder {
  id: number;
  customerId: number;
}

export interface CustomerRepository {
  /**
   * Delete every customer matching the criteria in one atomic operation.
   * @returns Number of customers removed
   */
  deleteInactiveCustomers(criteria: InactiveCustomerCriteria): Promise<number>;
  countInactiveCustomers(criteria: InactiveCustomerCriteria): Promise<number>;
  /** Round trip to the store; rejects when it cannot be reached */
  ping(): Promise<void>;
}

export function isInactiveCustomer(
  customer: Pick<ICustomer, "created">,
  orderCount: number,
  criteria: InactiveCustomerCriteria,
): boolean {
  return orderCount === 0 && customer.created.getTime() < criteria.createdBefore.getTime();
}

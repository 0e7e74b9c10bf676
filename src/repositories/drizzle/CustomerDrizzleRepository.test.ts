import { describe, expect, it, vi, beforeEach } from "vitest";
import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";

import { CustomerDrizzleRepository } from "./CustomerDrizzleRepository";
import { customers, orders } from "./schema";
import { CustomerRepositoryError, CustomerRepositoryErrorType } from "../errors/CustomerRepositoryError";

/**
 * Chainable stand-in for the drizzle query builder. Selects from the order table
 * build the existence subquery and are never awaited; selects from the customer
 * table resolve to the configured rows.
 */
function createMockDrizzleDb() {
  const deleteWhere = vi.fn();
  const deleteFn = vi.fn().mockReturnValue({ where: deleteWhere });

  const selectWhere = vi.fn();
  const subqueryWhere = vi.fn().mockReturnValue({});
  const selectFrom = vi
    .fn()
    .mockImplementation((table: unknown) => (table === orders ? { where: subqueryWhere } : { where: selectWhere }));
  const select = vi.fn().mockReturnValue({ from: selectFrom });

  const execute = vi.fn();

  return {
    db: { delete: deleteFn, select, execute } as unknown as PostgresJsDatabase,
    deleteFn,
    deleteWhere,
    select,
    selectFrom,
    selectWhere,
    subqueryWhere,
    execute,
  };
}

describe("CustomerDrizzleRepository", () => {
  const criteria = { createdBefore: new Date("2025-10-19T02:00:00.000Z") };
  let mock: ReturnType<typeof createMockDrizzleDb>;
  let repository: CustomerDrizzleRepository;

  beforeEach(() => {
    mock = createMockDrizzleDb();
    repository = new CustomerDrizzleRepository(mock.db);
  });

  describe("deleteInactiveCustomers", () => {
    it("should delete from the customer table and return the affected row count", async () => {
      mock.deleteWhere.mockResolvedValue({ count: 4 });

      const deleted = await repository.deleteInactiveCustomers(criteria);

      expect(deleted).toBe(4);
      expect(mock.deleteFn).toHaveBeenCalledWith(customers);
      expect(mock.deleteWhere).toHaveBeenCalledTimes(1);
      expect(mock.deleteWhere.mock.calls[0][0]).toBeDefined();
    });

    it("should return zero when nothing matched", async () => {
      mock.deleteWhere.mockResolvedValue({ count: 0 });

      expect(await repository.deleteInactiveCustomers(criteria)).toBe(0);
    });

    it("should build the order existence subquery", async () => {
      mock.deleteWhere.mockResolvedValue({ count: 0 });

      await repository.deleteInactiveCustomers(criteria);

      expect(mock.select).toHaveBeenCalledTimes(1);
      expect(mock.selectFrom).toHaveBeenCalledWith(orders);
      expect(mock.subqueryWhere).toHaveBeenCalledTimes(1);
      expect(mock.selectWhere).not.toHaveBeenCalled();
    });

    it("should convert connection errors", async () => {
      mock.deleteWhere.mockRejectedValue(Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" }));

      const error = await repository.deleteInactiveCustomers(criteria).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(CustomerRepositoryError);
      expect(error).toMatchObject({
        type: CustomerRepositoryErrorType.CONNECTION_FAILED,
        message: "Database unreachable during inactive customer delete",
      });
    });

    it("should convert a concurrent order insert into a foreign key violation", async () => {
      mock.deleteWhere.mockRejectedValue({ code: "23503" });

      await expect(repository.deleteInactiveCustomers(criteria)).rejects.toMatchObject({
        type: CustomerRepositoryErrorType.FOREIGN_KEY_VIOLATION,
      });
    });
  });

  describe("countInactiveCustomers", () => {
    it("should return the counted rows", async () => {
      mock.selectWhere.mockResolvedValue([{ count: 3 }]);

      expect(await repository.countInactiveCustomers(criteria)).toBe(3);
      expect(mock.selectFrom).toHaveBeenCalledWith(customers);
    });

    it("should return zero when the query yields no row", async () => {
      mock.selectWhere.mockResolvedValue([]);

      expect(await repository.countInactiveCustomers(criteria)).toBe(0);
    });

    it("should convert driver errors", async () => {
      mock.selectWhere.mockRejectedValue({ code: "42P01" });

      await expect(repository.countInactiveCustomers(criteria)).rejects.toMatchObject({
        type: CustomerRepositoryErrorType.UNKNOWN_DATABASE_ERROR,
        databaseErrorCode: "42P01",
      });
    });
  });

  describe("ping", () => {
    it("should resolve when the database answers", async () => {
      mock.execute.mockResolvedValue([{ "?column?": 1 }]);

      await expect(repository.ping()).resolves.toBeUndefined();
      expect(mock.execute).toHaveBeenCalledTimes(1);
    });

    it("should reject with a connection failure when the database is down", async () => {
      mock.execute.mockRejectedValue({ code: "CONNECT_TIMEOUT" });

      await expect(repository.ping()).rejects.toThrow("Database unreachable during ping");
    });
  });
});

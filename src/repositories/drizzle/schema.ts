import { integer, numeric, pgTable, serial, timestamp, varchar } from "drizzle-orm/pg-core";

// Tables are owned by the CRM web application; this project only reads and deletes.

export const customers = pgTable("crm_customer", {
  id: serial("id").primaryKey(),
  name: varchar("name", { length: 255 }).notNull(),
  email: varchar("email", { length: 254 }).notNull().unique(),
  phone: varchar("phone", { length: 20 }),
  created: timestamp("created", { withTimezone: true }).defaultNow().notNull(),
});

export const orders = pgTable("crm_order", {
  id: serial("id").primaryKey(),
  customerId: integer("customer_id")
    .references(() => customers.id, { onDelete: "cascade" })
    .notNull(),
  orderDate: timestamp("order_date", { withTimezone: true }).defaultNow().notNull(),
  totalAmount: numeric("total_amount", { precision: 10, scale: 2 }).notNull().default("0"),
});

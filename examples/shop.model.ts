// Sample model. Evaluated by `tablewright` with the builder vocabulary as
// globals; it may not import anything.

Schema("Shop");

const OrderStatus = Enum("OrderStatus", "Pending", "Shipped", "Delivered");
const PaymentKind = Enum("PaymentKind", "Card", "Transfer", "Voucher");

Table(
  "customers",
  Column("id", BigInteger, { primaryKey: true, autoincrement: true }),
  Column("email", Varchar(255), { nullable: false, unique: true }),
  Column("vip", Bool, { nullable: false, default: false }),
  Column("created_at", DateTime, { nullable: false, default: CURRENT_TIMESTAMP })
);

Table(
  "orders",
  Column("id", BigInteger, { primaryKey: true, autoincrement: true }),
  Column("customer_id", BigInteger, {
    nullable: false,
    index: true,
    foreignKey: ForeignKey(tables.customers.ref("id"), { onDelete: CASCADE }),
  }),
  Column("status", OrderStatus, { nullable: false, default: 0 }),
  Column("payment", PaymentKind),
  Column("total", Numeric(10, 2), { nullable: false, default: 0 }),
  Column("note", Text, { comment: "Free text from the customer" })
);

StoredProcedure(
  "order_counter",
  ProcParam("total", "BIGINT", OUT),
  ProcComment("Count the orders"),
  ProcSqlBody(`
    SELECT COUNT(*) INTO total FROM orders;
  `)
);

// testing/fixtures.ts

import { BuildContext } from "../model/buildContext.js";
import { SchemaMetadata } from "../model/metadata.js";
import { type Vocabulary, createVocabulary } from "../model/vocabulary.js";

/** Empty model plus the vocabulary bound to it */
export function newModel(file = "test.model.ts"): { metadata: SchemaMetadata; v: Vocabulary } {
  const metadata = new SchemaMetadata(new BuildContext(file));
  return { metadata, v: createVocabulary(metadata) };
}

/** Schema `Shop`: enum OrderStatus and table orders(id, status) */
export function shopModel(): SchemaMetadata {
  const { metadata, v } = newModel("shop.model.ts");
  v.Schema("Shop");
  const OrderStatus = v.Enum("OrderStatus", "Pending", "Shipped", "Delivered");
  v.Table("orders", v.Column("id", v.Integer, { primaryKey: true }), v.Column("status", OrderStatus));
  return metadata;
}

export const SHOP_SOURCE = `Schema("Shop");

const OrderStatus = Enum("OrderStatus", "Pending", "Shipped", "Delivered");

Table(
  "orders",
  Column("id", Integer, { primaryKey: true }),
  Column("status", OrderStatus)
);
`;

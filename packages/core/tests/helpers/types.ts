import { Schema } from "effect";
import { makeTypeHandle } from "../../src/types/type-handle.js";

export const OrderSchema = Schema.Struct({
	id: Schema.String,
	total: Schema.Number,
});

export const Order = makeTypeHandle("com.example.Order", OrderSchema);

export const OrderSummary = makeTypeHandle(
	"com.example.OrderSummary",
	Schema.Struct({ id: Schema.String }),
);

export const TagSet = makeTypeHandle(
	"com.example.TagSet",
	Schema.ReadonlySet(Schema.String),
);

/**
 * Renames `placedAt` to `placed_at` and encodes the Date as an ISO string.
 */
export const Shipment = makeTypeHandle(
	"com.example.Shipment",
	Schema.Struct({
		id: Schema.String,
		placedAt: Schema.propertySignature(Schema.Date).pipe(
			Schema.fromKey("placed_at"),
		),
	}),
);

export const ALL_TYPES = [Order, OrderSummary, TagSet, Shipment] as const;

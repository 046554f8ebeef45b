import { z } from "zod";

// === Cells ===

export const CellSchema = z.union([z.string(), z.number(), z.boolean()]).nullable();

type Cell = z.infer<typeof CellSchema>;

const toCell = (value: unknown): Cell => {
	if (value === null || value === undefined) return null;
	if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") return value;
	return JSON.stringify(value);
};

// Leaf values are taken as they come; nested objects and arrays become their JSON text.
export const LeafSchema = z.unknown().transform(toCell);

// === Raw export (Semantic Location History) ===

export const CoordinatesSchema = z.object({
	latitudeE7: LeafSchema,
	longitudeE7: LeafSchema,
});

export const PlaceLocationSchema = CoordinatesSchema.extend({
	placeId: LeafSchema,
	address: LeafSchema,
	name: LeafSchema,
});

export const DurationSchema = z.object({
	startTimestamp: LeafSchema,
	endTimestamp: LeafSchema,
});

export const ActivitySegmentSchema = z.object({
	startLocation: CoordinatesSchema.nullish(),
	endLocation: CoordinatesSchema.nullish(),
	duration: DurationSchema.nullish(),
	distance: LeafSchema,
	activityType: LeafSchema,
});

export const PlaceVisitSchema = z.object({
	location: PlaceLocationSchema.nullish(),
	duration: DurationSchema.nullish(),
});

// Elements are classified one at a time in core.
export const MonthlyFileSchema = z.object({
	timelineObjects: z.array(z.unknown()),
});

// === Flat records ===

export const ActivityRecordSchema = z.object({
	timeline_type: z.literal("activity"),
	start_latitude: CellSchema,
	start_longitude: CellSchema,
	end_latitude: CellSchema,
	end_longitude: CellSchema,
	start_time: CellSchema,
	end_time: CellSchema,
	distance: CellSchema,
	activity_type: CellSchema,
});

export const VisitRecordSchema = z.object({
	timeline_type: z.literal("visit"),
	location_latitude: CellSchema,
	location_longitude: CellSchema,
	place_id: CellSchema,
	address: CellSchema,
	name: CellSchema,
	start_time: CellSchema,
	end_time: CellSchema,
});

export const TimelineRecordSchema = z.discriminatedUnion("timeline_type", [ActivityRecordSchema, VisitRecordSchema]);

export const ACTIVITY_COLUMNS = [
	"timeline_type",
	"start_latitude",
	"start_longitude",
	"end_latitude",
	"end_longitude",
	"start_time",
	"end_time",
	"distance",
	"activity_type",
] as const satisfies ReadonlyArray<keyof z.infer<typeof ActivityRecordSchema>>;

export const VISIT_COLUMNS = [
	"timeline_type",
	"location_latitude",
	"location_longitude",
	"place_id",
	"address",
	"name",
	"start_time",
	"end_time",
] as const satisfies ReadonlyArray<keyof z.infer<typeof VisitRecordSchema>>;

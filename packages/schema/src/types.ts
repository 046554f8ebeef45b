import type { z } from "zod";
import type {
	ActivityRecordSchema,
	ActivitySegmentSchema,
	CellSchema,
	CoordinatesSchema,
	DurationSchema,
	MonthlyFileSchema,
	PlaceLocationSchema,
	PlaceVisitSchema,
	TimelineRecordSchema,
	VisitRecordSchema,
} from "./timeline";

export type Cell = z.infer<typeof CellSchema>;
export type Coordinates = z.infer<typeof CoordinatesSchema>;
export type PlaceLocation = z.infer<typeof PlaceLocationSchema>;
export type Duration = z.infer<typeof DurationSchema>;
export type ActivitySegment = z.infer<typeof ActivitySegmentSchema>;
export type PlaceVisit = z.infer<typeof PlaceVisitSchema>;
export type MonthlyFile = z.infer<typeof MonthlyFileSchema>;

export type ActivityRecord = Readonly<z.infer<typeof ActivityRecordSchema>>;
export type VisitRecord = Readonly<z.infer<typeof VisitRecordSchema>>;
export type TimelineRecord = Readonly<z.infer<typeof TimelineRecordSchema>>;

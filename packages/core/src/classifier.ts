import {
	type ActivityRecord,
	type ActivitySegment,
	ActivitySegmentSchema,
	type InvalidRecordShapeError,
	type PlaceVisit,
	PlaceVisitSchema,
	type TimelineRecord,
	type VisitRecord,
} from "@timeline-csv/schema";
import type { z } from "zod";
import { invalidRecordShape } from "./errors";
import { type Result, isPlainObject, ok } from "./utils";

const formatIssues = (key: string, error: z.ZodError): string[] => error.issues.map(issue => `${[key, ...issue.path].join(".")}: ${issue.message}`);

const parseBody = <S extends z.ZodTypeAny>(schema: S, key: string, body: unknown, keys: string[]): Result<z.infer<S>, InvalidRecordShapeError> => {
	const parsed = schema.safeParse(body);
	if (!parsed.success) {
		return invalidRecordShape("invalid_body", keys, `"${key}" or one of its sub-mappings is not an object`, formatIssues(key, parsed.error));
	}
	return ok(parsed.data);
};

export const extractActivity = (segment: ActivitySegment): ActivityRecord => ({
	timeline_type: "activity",
	start_latitude: segment.startLocation?.latitudeE7 ?? null,
	start_longitude: segment.startLocation?.longitudeE7 ?? null,
	end_latitude: segment.endLocation?.latitudeE7 ?? null,
	end_longitude: segment.endLocation?.longitudeE7 ?? null,
	start_time: segment.duration?.startTimestamp ?? null,
	end_time: segment.duration?.endTimestamp ?? null,
	distance: segment.distance ?? null,
	activity_type: segment.activityType ?? null,
});

export const extractVisit = (visit: PlaceVisit): VisitRecord => ({
	timeline_type: "visit",
	location_latitude: visit.location?.latitudeE7 ?? null,
	location_longitude: visit.location?.longitudeE7 ?? null,
	place_id: visit.location?.placeId ?? null,
	address: visit.location?.address ?? null,
	name: visit.location?.name ?? null,
	start_time: visit.duration?.startTimestamp ?? null,
	end_time: visit.duration?.endTimestamp ?? null,
});

/**
 * Identify which of the two known shapes a raw timeline object has and flatten it into a row.
 *
 * The object must carry exactly one key, `activitySegment` or `placeVisit`. Fields missing
 * from the nested `startLocation`/`endLocation`/`location`/`duration` mappings come out as null.
 */
export const classifyTimelineObject = (raw: unknown): Result<TimelineRecord, InvalidRecordShapeError> => {
	if (!isPlainObject(raw)) {
		return invalidRecordShape("not_object", [], "Timeline object is expected to be a JSON object");
	}

	const keys = Object.keys(raw);
	const [key] = keys;
	if (keys.length !== 1 || key === undefined) {
		return invalidRecordShape("key_count", keys, `Key number in a timeline object is expected to be 1, but there are ${keys.length}`);
	}

	switch (key) {
		case "activitySegment": {
			const segment = parseBody(ActivitySegmentSchema, key, raw[key], keys);
			return segment.ok ? ok(extractActivity(segment.value)) : segment;
		}
		case "placeVisit": {
			const visit = parseBody(PlaceVisitSchema, key, raw[key], keys);
			return visit.ok ? ok(extractVisit(visit.value)) : visit;
		}
		default:
			return invalidRecordShape("unknown_key", keys, `Unexpected key "${key}" in the timeline object`);
	}
};

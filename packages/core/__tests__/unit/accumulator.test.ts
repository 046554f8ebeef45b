import type { ActivityRecord, Cell, VisitRecord } from "@timeline-csv/schema";
import { describe, expect, it } from "vitest";
import { createTimelineAccumulator, sortByStartTime } from "../../src/accumulator";

const makeActivity = (start_time: Cell, activity_type = "WALKING"): ActivityRecord => ({
	timeline_type: "activity",
	start_latitude: null,
	start_longitude: null,
	end_latitude: null,
	end_longitude: null,
	start_time,
	end_time: null,
	distance: null,
	activity_type,
});

const makeVisit = (start_time: Cell, name = "Test Place"): VisitRecord => ({
	timeline_type: "visit",
	location_latitude: null,
	location_longitude: null,
	place_id: null,
	address: null,
	name,
	start_time,
	end_time: null,
});

describe("sortByStartTime", () => {
	it("orders records by start time ascending", () => {
		const records = [makeActivity("2021-01-03T00:00:00Z"), makeActivity("2021-01-01T00:00:00Z"), makeActivity("2021-01-02T00:00:00Z")];

		const sorted = sortByStartTime(records);

		expect(sorted.map(r => r.start_time)).toEqual(["2021-01-01T00:00:00Z", "2021-01-02T00:00:00Z", "2021-01-03T00:00:00Z"]);
	});

	it("keeps encounter order for equal start times", () => {
		const records = [makeActivity("2021-01-02T00:00:00Z", "first"), makeActivity("2021-01-01T00:00:00Z", "earliest"), makeActivity("2021-01-02T00:00:00Z", "second"), makeActivity("2021-01-02T00:00:00Z", "third")];

		const sorted = sortByStartTime(records);

		expect(sorted.map(r => r.activity_type)).toEqual(["earliest", "first", "second", "third"]);
	});

	it("puts missing start times last in encounter order", () => {
		const records = [makeActivity(null, "a"), makeActivity("2021-01-02T00:00:00Z", "b"), makeActivity(null, "c"), makeActivity("2021-01-01T00:00:00Z", "d")];

		const sorted = sortByStartTime(records);

		expect(sorted.map(r => r.activity_type)).toEqual(["d", "b", "a", "c"]);
	});

	it("orders numeric start times numerically", () => {
		const records = [makeActivity(10, "ten"), makeActivity(9, "nine")];

		expect(sortByStartTime(records).map(r => r.activity_type)).toEqual(["nine", "ten"]);
	});

	it("does not modify its input", () => {
		const records = [makeActivity("2021-01-02T00:00:00Z"), makeActivity("2021-01-01T00:00:00Z")];

		sortByStartTime(records);

		expect(records.map(r => r.start_time)).toEqual(["2021-01-02T00:00:00Z", "2021-01-01T00:00:00Z"]);
	});

	it("returns an empty array for no records", () => {
		expect(sortByStartTime([])).toEqual([]);
	});
});

describe("createTimelineAccumulator", () => {
	it("routes records by timeline type", () => {
		const accumulator = createTimelineAccumulator();

		accumulator.add(makeActivity("2021-01-01T00:00:00Z"));
		accumulator.add(makeVisit("2021-01-01T00:00:00Z"));
		accumulator.add(makeActivity("2021-01-02T00:00:00Z"));

		expect(accumulator.counts()).toEqual({ activities: 2, visits: 1 });
		const tables = accumulator.tables();
		expect(tables.activities.every(r => r.timeline_type === "activity")).toBe(true);
		expect(tables.visits).toEqual([makeVisit("2021-01-01T00:00:00Z")]);
	});

	it("sorts each table independently", () => {
		const accumulator = createTimelineAccumulator();

		accumulator.add(makeVisit("2021-02-01T00:00:00Z", "later"));
		accumulator.add(makeActivity("2021-01-15T00:00:00Z"));
		accumulator.add(makeVisit("2021-01-01T00:00:00Z", "earlier"));

		const tables = accumulator.tables();
		expect(tables.visits.map(v => v.name)).toEqual(["earlier", "later"]);
		expect(tables.activities).toHaveLength(1);
	});

	it("starts empty", () => {
		const accumulator = createTimelineAccumulator();

		expect(accumulator.counts()).toEqual({ activities: 0, visits: 0 });
		expect(accumulator.tables()).toEqual({ activities: [], visits: [] });
	});
});

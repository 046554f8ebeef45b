import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

export type RawActivityInput = {
	startLat?: number;
	startLng?: number;
	endLat?: number;
	endLng?: number;
	start?: string;
	end?: string;
	distance?: number;
	activityType?: string;
};

export type RawVisitInput = {
	lat?: number;
	lng?: number;
	placeId?: string;
	address?: string;
	name?: string;
	start?: string;
	end?: string;
};

export const makeActivitySegment = (overrides: RawActivityInput = {}) => ({
	activitySegment: {
		startLocation: { latitudeE7: overrides.startLat ?? 356812360, longitudeE7: overrides.startLng ?? 1397671250 },
		endLocation: { latitudeE7: overrides.endLat ?? 356585805, longitudeE7: overrides.endLng ?? 1397454329 },
		duration: {
			startTimestamp: overrides.start ?? "2021-01-02T09:00:00Z",
			endTimestamp: overrides.end ?? "2021-01-02T09:30:00Z",
		},
		distance: overrides.distance ?? 3400,
		activityType: overrides.activityType ?? "IN_TRAIN",
		confidence: "HIGH",
	},
});

export const makePlaceVisit = (overrides: RawVisitInput = {}) => ({
	placeVisit: {
		location: {
			latitudeE7: overrides.lat ?? 356585805,
			longitudeE7: overrides.lng ?? 1397454329,
			placeId: overrides.placeId ?? "test-place-1",
			address: overrides.address ?? "1 Test Street, Test City",
			name: overrides.name ?? "Test Cafe",
		},
		duration: {
			startTimestamp: overrides.start ?? "2021-01-01T10:00:00Z",
			endTimestamp: overrides.end ?? "2021-01-01T11:00:00Z",
		},
		placeConfidence: "HIGH_CONFIDENCE",
	},
});

export const makeMonthlyFile = (timelineObjects: unknown[]) => ({ timelineObjects });

export type TempDir = {
	path: string;
	file: (relative: string) => string;
	writeJson: (relative: string, value: unknown) => string;
	writeText: (relative: string, text: string) => string;
	cleanup: () => void;
};

export const createTempDir = (prefix = "timeline-csv-"): TempDir => {
	const path = mkdtempSync(join(tmpdir(), prefix));
	const file = (relative: string) => join(path, relative);
	const writeText = (relative: string, text: string) => {
		const target = file(relative);
		mkdirSync(dirname(target), { recursive: true });
		writeFileSync(target, text, "utf8");
		return target;
	};

	return {
		path,
		file,
		writeJson: (relative, value) => writeText(relative, JSON.stringify(value)),
		writeText,
		cleanup: () => rmSync(path, { recursive: true, force: true }),
	};
};

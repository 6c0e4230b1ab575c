/* STYLE SEQUENCE
/*-----------------------------------------------------
/* Hands out a different combination of style values
/* each time it is asked, so that successive lines, bars
/* or points on one chart can be told apart.
/* ==================================================== */

import { ConfigurationError } from "../errors/index.ts";
import { checkColor, type Color } from "./color.ts";

export const POINT_SHAPES = [
	"dot",
	"cross",
	"square",
	"plus",
	"diamond",
	"circle",
] as const;

export type PointShape = (typeof POINT_SHAPES)[number];

export interface ChoiceLists {
	red: readonly number[];
	green: readonly number[];
	blue: readonly number[];
	/** Sets red and green together */
	yellow: readonly number[];
	/** Sets red and blue together */
	mauve: readonly number[];
	/** Sets green and blue together */
	cyan: readonly number[];
	gray: readonly Color[];
	shape: readonly PointShape[];
	width: readonly number[];
	dashes: readonly (readonly number[])[];
	size: readonly number[];
}

export type ChoiceKey = keyof ChoiceLists;

export interface StyleRecord {
	readonly red: number;
	readonly green: number;
	readonly blue: number;
	readonly gray: Color;
	readonly shape: PointShape;
	readonly width: number;
	readonly dashes: readonly number[];
	readonly size: number;
}

export const DEFAULT_CHOICE_LISTS: ChoiceLists = {
	red: [0.5, 1, 0],
	green: [0, 0.5, 0.25, 0.75, 1],
	blue: [0, 1, 0.5],
	yellow: [0.9, 0.2, 0.5],
	mauve: [0.9, 0.2, 0.5],
	cyan: [0.9, 0.2, 0.5],
	gray: [0.6, 0, 0.45, 0.15, 0.75, 0.3, 0.9],
	shape: POINT_SHAPES,
	width: [1, 0.5, 4, 2],
	dashes: [[], [3, 3], [9, 9], [10, 5, 3, 5]],
	size: [5, 3, 7],
};

export const DEFAULT_CHOICES: readonly ChoiceKey[] = ["shape", "dashes", "size", "width"];

export const DEFAULT_STYLE_RECORD: StyleRecord = Object.freeze({
	red: 0,
	green: 0,
	blue: 0,
	gray: 0,
	shape: "dot",
	width: 0.5,
	dashes: [],
	size: 5,
});

/** Written settings of a style, by PostScript variable name */
export type StyleSettings = ReadonlyMap<string, string>;

export function isChoiceKey(key: string): key is ChoiceKey {
	return Object.hasOwn(DEFAULT_CHOICE_LISTS, key);
}

/**
 * Steps through every permutation of the chosen lists like an odometer: the
 * first choice changes on every call, the second when the first wraps, and so
 * on, starting again from the first values after the last permutation.
 *
 * Each chart owns its generator; nothing is shared between generators.
 */
export class SequenceGenerator {
	private readonly lists: ChoiceLists = { ...DEFAULT_CHOICE_LISTS };
	private choices: ChoiceKey[] = [];
	private counters: number[] = [];
	private initialized = false;
	private styleId = 0;
	private previous: StyleSettings | undefined;

	/** Replaces one list of values; the sequence starts again */
	setup<K extends ChoiceKey>(key: K, values: ChoiceLists[K]): void {
		if (values.length === 0) {
			throw new ConfigurationError(`sequence.${key}`, "must not be empty");
		}
		const list: readonly unknown[] = values;
		if (COLOR_KEYS.has(key)) {
			for (const value of list) checkChoiceColor(value, `sequence.${key}`);
		}
		this.lists[key] = values;
		this.initialized = false;
	}

	reset(): void {
		this.initialized = false;
	}

	/**
	 * Returns the next combination. Passing a different `auto` list than the
	 * one in use starts again from the first combination of the new list.
	 */
	next(auto?: readonly string[]): StyleRecord {
		if (auto !== undefined && !sameChoices(normalizeChoices(auto), this.choices)) {
			this.initialized = false;
		}
		if (!this.initialized) {
			this.start(normalizeChoices(auto ?? this.choices));
			return this.current();
		}
		this.advance();
		return this.current();
	}

	get currentChoices(): readonly ChoiceKey[] {
		return this.choices;
	}

	newStyleId(): number {
		this.styleId += 1;
		return this.styleId;
	}

	/** Settings written by the last style that used this sequence */
	previousStyle(): StyleSettings | undefined {
		return this.previous;
	}

	registerStyle(settings: StyleSettings): void {
		this.previous = settings;
	}

	private start(choices: ChoiceKey[]): void {
		this.choices = choices;
		this.counters = choices.map(() => 0);
		this.initialized = true;
	}

	private advance(): void {
		for (let i = 0; i < this.choices.length; i++) {
			const key = this.choices[i]!;
			if (this.counters[i]! < this.lists[key].length - 1) {
				this.counters[i]! += 1;
				return;
			}
			this.counters[i] = 0;
		}
	}

	private current(): StyleRecord {
		let record: StyleRecord = DEFAULT_STYLE_RECORD;
		this.choices.forEach((key, i) => {
			record = applyChoice(record, this.lists, key, this.counters[i]!);
		});
		return record;
	}
}

const COLOR_KEYS: ReadonlySet<ChoiceKey> = new Set([
	"red",
	"green",
	"blue",
	"yellow",
	"mauve",
	"cyan",
	"gray",
]);

function checkChoiceColor(value: unknown, field: string): void {
	if (typeof value === "number") {
		checkColor(value, field);
		return;
	}
	if (
		field === "sequence.gray" &&
		Array.isArray(value) &&
		value.length === 3 &&
		value.every((channel) => typeof channel === "number")
	) {
		checkColor([value[0], value[1], value[2]], field);
		return;
	}
	throw new ConfigurationError(field, `${JSON.stringify(value)} is not a color`);
}

// Unknown keys are dropped; an empty result means the default choices
function normalizeChoices(auto: readonly string[]): ChoiceKey[] {
	const keys = auto.filter(isChoiceKey);
	return keys.length > 0 ? keys : [...DEFAULT_CHOICES];
}

function sameChoices(a: readonly ChoiceKey[], b: readonly ChoiceKey[]): boolean {
	return a.length === b.length && a.every((key, i) => key === b[i]);
}

function applyChoice(
	record: StyleRecord,
	lists: ChoiceLists,
	key: ChoiceKey,
	index: number,
): StyleRecord {
	switch (key) {
		case "yellow": {
			const v = lists.yellow[index]!;
			return { ...record, red: v, green: v };
		}
		case "mauve": {
			const v = lists.mauve[index]!;
			return { ...record, red: v, blue: v };
		}
		case "cyan": {
			const v = lists.cyan[index]!;
			return { ...record, green: v, blue: v };
		}
		case "gray": {
			const v = lists.gray[index]!;
			if (typeof v !== "number") return { ...record, gray: v };
			return { ...record, red: v * 0.3, green: v * 0.59, blue: v * 0.11, gray: v };
		}
		case "red":
			return { ...record, red: lists.red[index]! };
		case "green":
			return { ...record, green: lists.green[index]! };
		case "blue":
			return { ...record, blue: lists.blue[index]! };
		case "width":
			return { ...record, width: lists.width[index]! };
		case "size":
			return { ...record, size: lists.size[index]! };
		case "shape":
			return { ...record, shape: lists.shape[index]! };
		case "dashes":
			return { ...record, dashes: lists.dashes[index]! };
	}
}

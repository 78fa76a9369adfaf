import type {
  COMMENT_MATCH_MODE_VALUES,
  ENTRY_TYPE_VALUES,
  INTENSITY_VALUES,
  SPEED_MODE_VALUES,
} from "./constants";

export type Intensity = (typeof INTENSITY_VALUES)[number];
export type EntryType = (typeof ENTRY_TYPE_VALUES)[number];
export type CommentMatchMode = (typeof COMMENT_MATCH_MODE_VALUES)[number];
export type SpeedMode = (typeof SPEED_MODE_VALUES)[number];

/** Id-keyed lookup table; ids are stable across reloads, object identity is not. */
export type IdTable<T extends { id: number }> = ReadonlyMap<number, T>;

export type SportSubType = {
  id: number;
  name: string;
};

export type Equipment = {
  id: number;
  name: string;
  notInUse?: boolean;
};

export type SportType = {
  id: number;
  name: string;
  recordDistance: boolean;
  speedMode: SpeedMode;
  color?: string;
  icon?: string;
  sportSubTypes: IdTable<SportSubType>;
  equipment: IdTable<Equipment>;
};

export type SportTypeTable = IdTable<SportType>;

export type Entry = {
  id: number;
  dateTime: Date;
  comment?: string;
};

export type Exercise = Entry & {
  sportType: SportType;
  sportSubType: SportSubType;
  equipment?: Equipment;
  intensity: Intensity;
  /** Seconds. */
  duration: number;
  /** Kilometers; 0 when the sport type does not record distance. */
  distance: number;
  /** km/h */
  avgSpeed: number;
  ascent?: number;
  descent?: number;
  avgHeartRate?: number;
  calories?: number;
};

export type Note = Entry & {
  text: string;
};

export type Weight = Entry & {
  /** Kilograms. */
  value: number;
};

export type EntryFilter = {
  entryType: EntryType;
  /** Inclusive, compared by local calendar day. */
  dateStart?: Date;
  /** Inclusive, compared by local calendar day. */
  dateEnd?: Date;
  sportType?: SportType;
  sportSubType?: SportSubType;
  equipment?: Equipment;
  intensity?: Intensity;
  commentSubString?: string;
  commentMatchMode: CommentMatchMode;
};

export type CommentMatcher = (comment: string | undefined) => boolean;

export type SportTypeUsage = {
  sportTypeId: number;
  exerciseCount: number;
  sportSubTypeIds: number[];
  equipmentIds: number[];
};

export type DanglingReference = {
  exerciseId: number;
  kind: "sportType" | "sportSubType" | "equipment";
  referenceId: number;
};

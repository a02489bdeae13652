/**
 * iDigBio query format
 *
 * Zod schemas for the `rq` (records) and `mq` (media) filter objects accepted
 * by the iDigBio search API. Every field is optional; an empty object is a
 * wildcard query.
 *
 * Each field has a shape kind that fixes which value forms it accepts:
 *
 * | kind   | accepted values                                   |
 * |--------|---------------------------------------------------|
 * | string | string, string[] (OR), existence marker           |
 * | date   | YYYY-MM-DD, {type:"range",gte,lte}, existence     |
 * | float  | number, existence marker                          |
 * | int    | integer, existence marker                         |
 * | bool   | boolean, existence marker                         |
 *
 * `geopoint` has its own two-variant shape. Geo-point failures are marked
 * terminal: no amount of regeneration fixes an impossible coordinate.
 */

import { z } from "zod";

// ============================================================================
// Terminal issues
// ============================================================================

export type TerminalIssueCode = "geopoint_range_error" | "geo_missing_field" | "geo_type_mismatch" | "envelope_mismatch";

/**
 * Record a validation issue that must stop the generation retry loop.
 */
export function addTerminalIssue(
  ctx: z.RefinementCtx,
  code: TerminalIssueCode,
  message: string,
  path: Array<string | number> = [],
): void {
  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message,
    path,
    params: { terminal: true, terminal_code: code },
  });
}

export function isTerminalIssue(issue: z.ZodIssue): boolean {
  return issue.code === z.ZodIssueCode.custom && issue.params?.terminal === true;
}

/**
 * First terminal issue of a failed parse, if any
 */
export function findTerminalIssue(error: z.ZodError): z.ZodIssue | undefined {
  return error.issues.find(isTerminalIssue);
}

// ============================================================================
// Value shapes
// ============================================================================

export const Existence = z.object({
  type: z.enum(["exists", "missing"]),
});

const ISO_DATE = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;

/**
 * Calendar date. Accepts unpadded months/days and normalises to YYYY-MM-DD.
 */
export const IsoDate = z.string().transform((val, ctx) => {
  const match = ISO_DATE.exec(val.trim());
  if (match) {
    const [, y, m, d] = match.map(Number);
    const probe = new Date(Date.UTC(y, m - 1, d));
    if (probe.getUTCFullYear() === y && probe.getUTCMonth() === m - 1 && probe.getUTCDate() === d) {
      return `${match[1]}-${String(m).padStart(2, "0")}-${String(d).padStart(2, "0")}`;
    }
  }
  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message: `Invalid date "${val}", expected YYYY-MM-DD`,
  });
  return z.NEVER;
});

export const DateRange = z.object({
  type: z.literal("range"),
  gte: IsoDate.optional().describe("The start date of the range"),
  lte: IsoDate.optional().describe("The end date of the range"),
});

export const StringValue = z.union([z.string(), z.array(z.string()), Existence]);
export const DateValue = z.union([IsoDate, DateRange, Existence]);
export const FloatValue = z.union([z.number(), Existence]);
export const IntValue = z.union([z.number().int(), Existence]);
export const BoolValue = z.union([z.boolean(), Existence]);

export type FieldShapeKind = "string" | "date" | "float" | "int" | "bool";

const stringField = (description: string) => StringValue.optional().describe(description);
const dateField = (description: string) => DateValue.optional().describe(description);
const floatField = (description: string) => FloatValue.optional().describe(description);
const intField = (description: string) => IntValue.optional().describe(description);

// ============================================================================
// Geo-point
// ============================================================================

/**
 * Range checks sit on the number schemas so they fire whenever the value
 * parses, even if a sibling field does not.
 */
const Latitude = z.number().superRefine((value, ctx) => {
  if (!(value >= -90 && value <= 90)) {
    addTerminalIssue(ctx, "geopoint_range_error", `Invalid latitude value: ${value} is not in range [-90, +90]`);
  }
});

const Longitude = z.number().superRefine((value, ctx) => {
  if (!(value >= -180 && value <= 180)) {
    addTerminalIssue(ctx, "geopoint_range_error", `Invalid longitude value: ${value} is not in range [-180, +180]`);
  }
});

export const Coordinate = z.object({
  lat: Latitude.describe("latitude"),
  lon: Longitude.describe("longitude"),
});

const DISTANCE_FIELDS = ["lat", "lon", "distance"] as const;
const BOUNDING_BOX_FIELDS = ["top_left", "bottom_right"] as const;

/**
 * A location on earth: a point with an optional radius (geo_distance) or a
 * rectangle given by its top-left and bottom-right corners (geo_bounding_box).
 * The populated fields must match the declared type exactly.
 */
export const GeoPoint = z
  .object({
    type: z.enum(["geo_distance", "geo_bounding_box"]).default("geo_distance"),
    lat: Latitude.optional().describe("latitude (geo_distance only)"),
    lon: Longitude.optional().describe("longitude (geo_distance only)"),
    distance: z
      .string()
      .optional()
      .describe('distance in kilometers with km at the end, e.g. "575km" (geo_distance only)'),
    top_left: Coordinate.optional().describe("top-left corner of the box (geo_bounding_box only)"),
    bottom_right: Coordinate.optional().describe("bottom-right corner of the box (geo_bounding_box only)"),
  })
  .superRefine((point, ctx) => {
    if (point.type === "geo_distance") {
      if (BOUNDING_BOX_FIELDS.some((field) => point[field] !== undefined)) {
        addTerminalIssue(
          ctx,
          "geo_type_mismatch",
          "top_left and bottom_right should not be present when type is geo_distance",
        );
      }
      for (const field of ["lat", "lon"] as const) {
        if (point[field] === undefined) {
          addTerminalIssue(ctx, "geo_missing_field", `${field} is required when type is geo_distance`, [field]);
        }
      }
      return;
    }

    if (DISTANCE_FIELDS.some((field) => point[field] !== undefined)) {
      addTerminalIssue(
        ctx,
        "geo_type_mismatch",
        "lat, lon, and distance should not be present when type is geo_bounding_box",
      );
    }
    for (const field of BOUNDING_BOX_FIELDS) {
      if (point[field] === undefined) {
        addTerminalIssue(ctx, "geo_missing_field", `${field} is required when type is geo_bounding_box`, [field]);
      }
    }
  });

export type GeoPointT = z.infer<typeof GeoPoint>;

// ============================================================================
// Records query (rq)
// ============================================================================

export const RecordsQuery = z
  .object({
    associatedsequences: stringField(
      "Identifiers (e.g., GenBank accession numbers or URIs) for genetic sequence data linked to the specimen or occurrence.",
    ),
    barcodevalue: stringField("Machine-readable barcode string printed on the physical specimen label."),
    basisofrecord: stringField(
      "Specific nature of the data record (e.g., PreservedSpecimen, HumanObservation, MaterialSample).",
    ),
    bed: stringField("The full name of the lithostratigraphic bed from which a material entity was collected."),
    canonicalname: stringField(
      "The latinized elements of a scientific name, without authorship information.",
    ),
    catalognumber: stringField("Identifier (preferably unique) for the record within its source collection or dataset."),
    class: stringField("The taxonomic class of an organism."),
    collectioncode: stringField("Acronym, code, or name designating the collection from which the record is derived."),
    collectionid: stringField("Globally unique identifier (GUID/URI) for the collection housing the material."),
    collectionname: stringField("Human-readable name of the collection that holds the record."),
    collector: stringField("Name(s) of the person(s) or organization(s) who recorded or collected the occurrence."),
    commonname: stringField(
      'Common name for a specific species. Do not use for taxonomic groups like "birds" or "mammals".',
    ),
    continent: stringField("Name of the continent containing the sampling location."),
    country: stringField('Full, accepted country name. For example "Canada" instead of the ISO code CA.'),
    county: stringField("Full, unabbreviated name of the county (or equivalent) in which the location occurs."),
    datecollected: dateField("Date the specimen or observation was collected (ISO 8601 formatted)."),
    datemodified: dateField("Most recent date on which the digital record was changed (ISO 8601 formatted)."),
    dqs: floatField("Data quality score for the record."),
    etag: stringField("Entity-tag string used by iDigBio to detect record version changes."),
    eventdate: dateField("Date or date range during which the collecting event occurred (ISO 8601 formatted)."),
    family: stringField("Scientific name of the family in which the taxon is classified."),
    fieldnumber: stringField(
      "Identifier assigned in the field to the collecting event, linking field notes and specimens.",
    ),
    flags: stringField("Data-quality or processing flags applied to the record."),
    genus: stringField("Scientific name of the genus in which the taxon is classified."),
    geopoint: GeoPoint.optional().describe(
      "Decimal latitude/longitude (WGS 84) of the occurrence, searched by radius or bounding box.",
    ),
    hasImage: z.boolean().optional().describe("True if the record has one or more associated images."),
    highertaxon: stringField(
      'Pipe-separated list of higher taxonomic ranks above the taxon (e.g., "Animalia | Chordata | Mammalia").',
    ),
    infraspecificepithet: stringField('Lowest infraspecific epithet of the scientific name (e.g., "oxyadenia").'),
    institutioncode: stringField(
      "The name (or acronym) in use by the institution having custody of the object(s) or information referred to in the record.",
    ),
    institutionid: stringField(
      "An identifier for the institution having custody of the object(s) or information referred to in the record.",
    ),
    institutionname: stringField("Full name of the institution that owns or manages the collection or data."),
    kingdom: stringField("Scientific name of the kingdom in which the taxon is classified."),
    locality: stringField("Specific descriptive text of the place where the specimen was collected or observed."),
    maxdepth: floatField("Greater depth (metres) below the local surface at which the record was made."),
    maxelevation: floatField("Upper limit of elevation (metres above sea level) at the site."),
    mediarecords: stringField("Identifiers of media (images, audio, video) associated with the record."),
    mindepth: floatField("Lesser depth (metres) below the local surface at which the record was made."),
    minelevation: floatField("Lower limit of elevation (metres above sea level) at the site."),
    municipality: stringField("Name of the municipality or city containing the location."),
    occurrenceid: stringField("Globally unique identifier (GUID/URI) for the occurrence itself."),
    order: stringField("Scientific name of the order in which the taxon is classified."),
    phylum: stringField("Scientific name of the phylum or division in which the taxon is classified."),
    recordids: stringField("Specific iDigBio record UUIDs to include in the query."),
    recordnumber: stringField("Collector's number assigned to the occurrence at the time of collection."),
    recordset: stringField("Identifier for an iDigBio recordset (dataset) used to filter the query."),
    scientificname: stringField("Full scientific name, including authorship, applied to the organism."),
    specificepithet: stringField("Species epithet component of the scientific name."),
    stateprovince: stringField(
      "Name of the primary administrative region (state, province, region) for the location.",
    ),
    taxonid: stringField(
      "An identifier for the set of taxon information. May be a global unique identifier or an identifier specific to the data set.",
    ),
    taxonomicstatus: stringField(
      "The status of the use of the scientific name as a label for a taxon (e.g., accepted, invalid, misapplied, homotypic synonym).",
    ),
    taxonrank: stringField("Taxonomic rank of the most specific name (e.g., species, subspecies, genus)."),
    typestatus: stringField(
      'Nomenclatural types applied to the subject (e.g., "holotype of Pinus abies | holotype of Picea abies").',
    ),
    uuid: stringField("An internal identifier used by iDigBio to identify the record."),
    verbatimeventdate: stringField(
      "Original, unaltered text of the collection date as it appears on the label or notes.",
    ),
    verbatimlocality: stringField("Original, unaltered locality description from the specimen label."),
    version: intField("Integer representing the current revision number of the record in iDigBio."),
    waterbody: stringField("Name of the water body (ocean, sea, lake, river) in which the location occurs."),
  })
  .strict();

export type RecordsQueryT = z.infer<typeof RecordsQuery>;
export type RecordsQueryInput = z.input<typeof RecordsQuery>;
export type RecordsQueryField = keyof typeof RecordsQuery.shape;

// ============================================================================
// Media query (mq)
// ============================================================================

export const MediaQuery = z
  .object({
    accessuri: stringField("URL where the media file itself can be downloaded."),
    datemodified: dateField('The "datemodified" field in the original media record.'),
    etag: stringField("Entity-tag string used by iDigBio to detect media record version changes."),
    licenselogourl: stringField("URL of the logo of the license the media is published under."),
    mediatype: z.enum(["images", "sounds"]).optional().describe('Kind of media: "images" or "sounds".'),
    modified: dateField(
      "Last time the media record changed in iDigBio, whether the original record or iDigBio's metadata.",
    ),
    recordids: stringField("Specific iDigBio media record UUIDs to include in the query."),
    records: stringField("UUIDs for records that are associated with the media record."),
    recordset: stringField("The record set that the media record is a part of."),
    rights: stringField("Rights statement or license under which the media is published."),
    uuid: stringField("An identifier used by iDigBio to identify the media record."),
    version: intField("Integer representing the current revision number of the media record in iDigBio."),
  })
  .strict();

export type MediaQueryT = z.infer<typeof MediaQuery>;
export type MediaQueryInput = z.input<typeof MediaQuery>;

// ============================================================================
// Field documentation
// ============================================================================

const SHAPE_KINDS = new Map<z.ZodTypeAny, FieldShapeKind>([
  [StringValue, "string"],
  [DateValue, "date"],
  [FloatValue, "float"],
  [IntValue, "int"],
  [BoolValue, "bool"],
]);

const SHAPE_FORMS: Record<FieldShapeKind, string> = {
  string: 'string | string[] | {"type":"exists"|"missing"}',
  date: 'YYYY-MM-DD | {"type":"range","gte":date,"lte":date} | {"type":"exists"|"missing"}',
  float: 'number | {"type":"exists"|"missing"}',
  int: 'integer | {"type":"exists"|"missing"}',
  bool: 'boolean | {"type":"exists"|"missing"}',
};

function describeForm(schema: z.ZodTypeAny): string {
  const inner = schema instanceof z.ZodOptional ? schema.unwrap() : schema;
  const kind = SHAPE_KINDS.get(inner);
  if (kind) return SHAPE_FORMS[kind];
  if (inner === GeoPoint) {
    return '{"type":"geo_distance","lat","lon","distance"} | {"type":"geo_bounding_box","top_left":{"lat","lon"},"bottom_right":{"lat","lon"}}';
  }
  if (inner instanceof z.ZodEnum) {
    return inner.options.map((option: string) => JSON.stringify(option)).join(" | ");
  }
  if (inner instanceof z.ZodBoolean) return "boolean";
  return "value";
}

/**
 * Render a query object's fields as a markdown list for the system prompt.
 */
export function describeQueryFields(shape: z.ZodRawShape): string {
  return Object.entries(shape)
    .map(([name, field]) => `- \`${name}\` (${describeForm(field)}): ${field.description ?? ""}`.trimEnd())
    .join("\n");
}

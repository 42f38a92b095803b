import { err, ok, Result } from "neverthrow";
import { z } from "zod";
import {
  parseFailures,
  type ParseFailure,
} from "../../../core/failures/parseFailure";
import { DEFAULT_SNIPPET_LENGTH } from "../../../shared/text/displayText";

const numericField = z.union([z.number(), z.string()]);

const gammaMarketSchema = z.object({
  question: z.string(),
  conditionId: z.string(),
  slug: z.string(),
  outcomes: z.string(),
  outcomePrices: z.string(),
  clobTokenIds: z.string(),
  active: z.boolean(),
  closed: z.boolean(),
  volumeNum: numericField,
  liquidityNum: numericField,
  volume24hr: numericField.optional(),
  volume1wk: numericField.optional(),
  volume1mo: numericField.optional(),
  volume1yr: numericField.optional(),
  competitive: numericField.optional(),
  lastTradePrice: numericField.optional(),
  bestBid: numericField.optional(),
  bestAsk: numericField.optional(),
  updatedAt: z.string().optional(),
});

const gammaMarketGroupSchema = z.object({
  slug: z.string(),
  title: z.string(),
  active: z.boolean(),
  closed: z.boolean(),
  volume: numericField,
  liquidity: numericField,
  updatedAt: z.string().optional(),
  markets: z.array(gammaMarketSchema),
});

type RawGammaMarket = z.infer<typeof gammaMarketSchema>;
type RawGammaMarketGroup = z.infer<typeof gammaMarketGroupSchema>;

/**
 * A Gamma market with its JSON-encoded string arrays decoded and numbers coerced.
 * Quotes and window volumes the source omitted stay `undefined`.
 */
export type GammaMarketPayload = {
  question: string;
  conditionId: string;
  slug: string;
  outcomes: string[];
  outcomePrices: number[];
  clobTokenIds: readonly [string, string];
  active: boolean;
  closed: boolean;
  volumeNum: number;
  liquidityNum: number;
  volume24hr?: number;
  volume1wk?: number;
  volume1mo?: number;
  volume1yr?: number;
  competitive?: number;
  lastTradePrice?: number;
  bestBid?: number;
  bestAsk?: number;
  updatedAt?: string;
};

export type GammaMarketGroupPayload = {
  slug: string;
  title: string;
  active: boolean;
  closed: boolean;
  volume: number;
  liquidity: number;
  updatedAt?: string;
  markets: GammaMarketPayload[];
};

export type GammaParseOptions = {
  snippetMaxLength?: number;
};

const formatPath = (path: ReadonlyArray<string | number>): string =>
  path.reduce<string>((acc, segment) => {
    if (typeof segment === "number") {
      return `${acc}[${segment}]`;
    }
    return acc ? `${acc}.${segment}` : segment;
  }, "");

const valueAtPath = (
  input: unknown,
  path: ReadonlyArray<string | number>,
): unknown =>
  path.reduce<unknown>((current, segment) => {
    if (current === null || typeof current !== "object") {
      return undefined;
    }
    return Reflect.get(current, segment);
  }, input);

const describeValue = (value: unknown): string => {
  if (value === null) {
    return "null";
  }
  if (Array.isArray(value)) {
    return "array";
  }
  if (typeof value === "object") {
    return "object";
  }
  return `${typeof value} ${JSON.stringify(value)}`;
};

const parentTypeOf = (path: ReadonlyArray<string | number>): string =>
  path.length > 1 ? "market" : "market group";

const expectedFormatOf = (issue: z.ZodIssue): string =>
  issue.code === z.ZodIssueCode.invalid_type
    ? issue.expected
    : issue.code === z.ZodIssueCode.invalid_union
      ? "number or numeric string"
      : issue.message;

const wholePayloadFailure = (
  text: string,
  reason: string,
  maxLength: number,
): ParseFailure =>
  parseFailures.jsonDeserializationFailed(
    { expectedType: "market group", json: text, reason },
    { maxLength },
  );

/**
 * Reports the first schema issue as a parse failure; one failure per payload.
 * A payload of the wrong shape altogether has no field to name.
 */
const toParseFailure = (
  issue: z.ZodIssue,
  input: unknown,
  text: string,
  maxLength: number,
): ParseFailure => {
  const fieldName = formatPath(issue.path);
  const value = valueAtPath(input, issue.path);

  if (issue.path.length === 0) {
    return wholePayloadFailure(
      text,
      `expected ${expectedFormatOf(issue)}, got ${describeValue(value)}`,
      maxLength,
    );
  }

  if (value === undefined) {
    return parseFailures.missingField({
      fieldName,
      parentType: parentTypeOf(issue.path),
    });
  }

  return parseFailures.invalidFieldFormat(
    {
      fieldName,
      expectedFormat: expectedFormatOf(issue),
      actual: describeValue(value),
    },
    { maxLength },
  );
};

// Plain decimal notation only; hex, exponents and padding are rejected.
const DECIMAL_PATTERN = /^-?(?:\d+(?:\.\d*)?|\.\d+)$/;

const toNumber = (
  fieldName: string,
  raw: number | string,
  maxLength: number,
): Result<number, ParseFailure> => {
  const rawValue = String(raw);

  if (typeof raw === "string" && !raw.trim()) {
    return err(
      parseFailures.invalidNumber(
        { fieldName, rawValue, reason: "value is empty" },
        { maxLength },
      ),
    );
  }

  if (typeof raw === "string" && !DECIMAL_PATTERN.test(raw)) {
    return err(
      parseFailures.invalidNumber(
        { fieldName, rawValue, reason: "value is not a number" },
        { maxLength },
      ),
    );
  }

  const parsed = typeof raw === "number" ? raw : Number(raw);

  if (Number.isNaN(parsed)) {
    return err(
      parseFailures.invalidNumber(
        { fieldName, rawValue, reason: "value is not a number" },
        { maxLength },
      ),
    );
  }

  if (!Number.isFinite(parsed)) {
    return err(
      parseFailures.invalidNumber(
        { fieldName, rawValue, reason: "value is not finite" },
        { maxLength },
      ),
    );
  }

  return ok(parsed);
};

const toOptionalNumber = (
  fieldName: string,
  raw: number | string | undefined,
  maxLength: number,
): Result<number | undefined, ParseFailure> =>
  raw === undefined ? ok(undefined) : toNumber(fieldName, raw, maxLength);

/**
 * Decodes one of Gamma's stringified arrays (e.g. `"[\"Yes\", \"No\"]"`) into text items.
 */
const decodeTextList = (
  fieldName: string,
  encoded: string,
  maxLength: number,
): Result<string[], ParseFailure> => {
  let decoded: unknown;
  try {
    decoded = JSON.parse(encoded);
  } catch (error) {
    return err(
      parseFailures.jsonDeserializationFailed(
        {
          fieldName,
          expectedType: "list of text",
          json: encoded,
          reason: error instanceof Error ? error.message : String(error),
        },
        { maxLength },
      ),
    );
  }

  if (!Array.isArray(decoded)) {
    return err(
      parseFailures.invalidFieldFormat(
        {
          fieldName,
          expectedFormat: "list of text",
          actual: describeValue(decoded),
        },
        { maxLength },
      ),
    );
  }

  const list: unknown[] = decoded;
  const items: string[] = [];
  for (const [index, item] of list.entries()) {
    if (typeof item !== "string") {
      return err(
        parseFailures.invalidFieldFormat(
          {
            fieldName: `${fieldName}[${index}]`,
            expectedFormat: "text",
            actual: describeValue(item),
          },
          { maxLength },
        ),
      );
    }
    items.push(item);
  }

  return ok(items);
};

const decodeTokenIds = (
  fieldName: string,
  encoded: string,
  maxLength: number,
): Result<readonly [string, string], ParseFailure> =>
  decodeTextList(fieldName, encoded, maxLength).andThen((ids) => {
    const [first, second] = ids;
    if (ids.length !== 2 || first === undefined || second === undefined) {
      return err(
        parseFailures.invalidArrayLength({
          fieldName,
          expected: 2,
          actual: ids.length,
        }),
      );
    }
    return ok([first, second] as const);
  });

const decodePrices = (
  fieldName: string,
  encoded: string,
  maxLength: number,
): Result<number[], ParseFailure> =>
  decodeTextList(fieldName, encoded, maxLength).andThen((prices) =>
    Result.combine(
      prices.map((price, index) =>
        toNumber(`${fieldName}[${index}]`, price, maxLength),
      ),
    ),
  );

const decodeMarket = (
  raw: RawGammaMarket,
  index: number,
  maxLength: number,
): Result<GammaMarketPayload, ParseFailure> => {
  const path = (field: string): string => `markets[${index}].${field}`;
  const numberAt = (field: keyof RawGammaMarket, value: number | string) =>
    toNumber(path(field), value, maxLength);
  const optionalNumberAt = (
    field: keyof RawGammaMarket,
    value: number | string | undefined,
  ) => toOptionalNumber(path(field), value, maxLength);

  return Result.combine([
    decodeTextList(path("outcomes"), raw.outcomes, maxLength),
    decodePrices(path("outcomePrices"), raw.outcomePrices, maxLength),
    decodeTokenIds(path("clobTokenIds"), raw.clobTokenIds, maxLength),
  ]).andThen(([outcomes, outcomePrices, clobTokenIds]) =>
    Result.combine([
      numberAt("volumeNum", raw.volumeNum),
      numberAt("liquidityNum", raw.liquidityNum),
      optionalNumberAt("volume24hr", raw.volume24hr),
      optionalNumberAt("volume1wk", raw.volume1wk),
      optionalNumberAt("volume1mo", raw.volume1mo),
      optionalNumberAt("volume1yr", raw.volume1yr),
      optionalNumberAt("competitive", raw.competitive),
      optionalNumberAt("lastTradePrice", raw.lastTradePrice),
      optionalNumberAt("bestBid", raw.bestBid),
      optionalNumberAt("bestAsk", raw.bestAsk),
    ]).map(
      ([
        volumeNum,
        liquidityNum,
        volume24hr,
        volume1wk,
        volume1mo,
        volume1yr,
        competitive,
        lastTradePrice,
        bestBid,
        bestAsk,
      ]) => ({
        question: raw.question,
        conditionId: raw.conditionId,
        slug: raw.slug,
        outcomes,
        outcomePrices,
        clobTokenIds,
        active: raw.active,
        closed: raw.closed,
        volumeNum,
        liquidityNum,
        volume24hr,
        volume1wk,
        volume1mo,
        volume1yr,
        competitive,
        lastTradePrice,
        bestBid,
        bestAsk,
        updatedAt: raw.updatedAt,
      }),
    ),
  );
};

const decodeGroup = (
  raw: RawGammaMarketGroup,
  maxLength: number,
): Result<GammaMarketGroupPayload, ParseFailure> =>
  Result.combine([
    toNumber("volume", raw.volume, maxLength),
    toNumber("liquidity", raw.liquidity, maxLength),
  ]).andThen(([volume, liquidity]) =>
    Result.combine(
      raw.markets.map((market, index) => decodeMarket(market, index, maxLength)),
    ).map((markets) => ({
      slug: raw.slug,
      title: raw.title,
      active: raw.active,
      closed: raw.closed,
      volume,
      liquidity,
      updatedAt: raw.updatedAt,
      markets,
    })),
  );

/**
 * Translates raw Gamma event text into a typed payload, reporting the first structural problem found.
 */
export const parseMarketGroupPayload = (
  text: string,
  options: GammaParseOptions = {},
): Result<GammaMarketGroupPayload, ParseFailure> => {
  const maxLength = options.snippetMaxLength ?? DEFAULT_SNIPPET_LENGTH;

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    return err(
      parseFailures.jsonDeserializationFailed(
        {
          expectedType: "market group",
          json: text,
          reason: error instanceof Error ? error.message : String(error),
        },
        { maxLength },
      ),
    );
  }

  const parsed = gammaMarketGroupSchema.safeParse(json);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    if (!issue) {
      return err(
        wholePayloadFailure(
          text,
          `expected market group, got ${describeValue(json)}`,
          maxLength,
        ),
      );
    }
    return err(toParseFailure(issue, json, text, maxLength));
  }

  return decodeGroup(parsed.data, maxLength);
};

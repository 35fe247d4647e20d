/**
 * Purpose: thin wrapper over a Mongo collection that validates every document
 * it hands back with a Zod schema.
 * Fit: base of the engagement repositories; each repository owns one store per
 * collection and keeps its write logic (transactions, unique-index handling)
 * to itself.
 * Invariants: all documents carry `_id: string`; `parse` never throws. A
 * document that fails validation is logged and dropped (`null`), never
 * patched with defaults, because ledger and award rows are facts.
 */
import type {
  ClientSession,
  Collection,
  Document,
  Filter,
  FindOptions,
} from "mongodb";
import type { ZodType, ZodTypeDef } from "zod";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { toError } from "./helpers";
import { getDb } from "./mongo";

export class MongoStore<T extends Document & { _id: string }> {
  constructor(
    readonly collectionName: string,
    private readonly schema: ZodType<T, ZodTypeDef, unknown>,
  ) {}

  /** Resolve the collection; `getDb` owns the client singleton. */
  public async collection(): Promise<Collection<T>> {
    return (await getDb()).collection<T>(this.collectionName);
  }

  /** Validate a raw document. Logs and returns `null` on schema failure. */
  parse(doc: unknown): T | null {
    const parsed = this.schema.safeParse(doc);
    if (parsed.success) return parsed.data;

    const id =
      typeof doc === "object" && doc !== null && "_id" in doc
        ? String(doc._id)
        : "unknown";
    console.error(
      `[MongoStore:${this.collectionName}] invalid document; skipping`,
      { id, error: parsed.error },
    );
    return null;
  }

  /** Read one document by `_id`. `Ok(null)` when missing. */
  async get(id: string, session?: ClientSession): Promise<Result<T | null>> {
    try {
      const col = await this.collection();
      const doc = await col.findOne({ _id: id } as Filter<T>, { session });
      return OkResult(doc ? this.parse(doc) : null);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  /** Read one document matching `filter`. */
  async findOne(
    filter: Filter<T>,
    session?: ClientSession,
  ): Promise<Result<T | null>> {
    try {
      const col = await this.collection();
      const doc = await col.findOne(filter, { session });
      return OkResult(doc ? this.parse(doc) : null);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  /** Read many documents; invalid ones are dropped after logging. */
  async find(filter: Filter<T>, options?: FindOptions): Promise<Result<T[]>> {
    try {
      const col = await this.collection();
      const docs = await col.find(filter, options).toArray();
      const parsed: T[] = [];
      for (const doc of docs) {
        const value = this.parse(doc);
        if (value) parsed.push(value);
      }
      return OkResult(parsed);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }
}

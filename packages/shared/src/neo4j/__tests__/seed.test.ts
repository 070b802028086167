import { describe, it, expect } from "vitest";
import neo4j from "neo4j-driver";
import { seedDatabase } from "../seed.js";
import { createMockDriver, runCall } from "./mock-driver.js";

describe("seedDatabase", () => {
  it("creates constraints, lookup indexes and the vector index", async () => {
    const { driver, mockTx, session } = createMockDriver();
    mockTx.run.mockResolvedValue({ records: [] });
    const messages: string[] = [];

    const result = await seedDatabase(driver, { dimensions: 768 }, { info: (m) => messages.push(m) });

    expect(result).toEqual({ constraints: 5, indexes: 8, vectorIndexes: 1 });
    expect(mockTx.run).toHaveBeenCalledTimes(14);
    expect(runCall(mockTx, 0).cypher).toContain("CREATE CONSTRAINT article_id IF NOT EXISTS");
    const vector = runCall(mockTx, 13);
    expect(vector.cypher).toContain("CREATE VECTOR INDEX article_embedding IF NOT EXISTS");
    expect(vector.params).toEqual({ dimensions: neo4j.int(768) });
    expect(messages.at(-1)).toBe(
      'Seed complete: 5 constraints, 8 indexes, vector index "article_embedding"',
    );
    expect(session.close).toHaveBeenCalledTimes(1);
  });
});

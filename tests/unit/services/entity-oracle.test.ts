import { describe, it, expect, beforeEach } from "vitest";
import { createEntityOracle } from "../../../src/services/entity-oracle.js";
import { createMockDb, resetDbMocks, createChainableProxy } from "../../helpers/mock-db.js";

const mockDb = createMockDb();

describe("entity oracle", () => {
  beforeEach(() => {
    resetDbMocks(mockDb);
  });

  it.each(["project", "version", "user"] as const)("reports an existing %s", async (kind) => {
    const selectChain = createChainableProxy([{ id: 5n }]);
    mockDb.select.mockReturnValueOnce(selectChain);

    await expect(createEntityOracle().exists(mockDb as never, kind, 5n)).resolves.toBe(true);
    expect(selectChain.limit).toHaveBeenCalledWith(1);
  });

  it.each(["project", "version", "user"] as const)("reports a missing %s", async (kind) => {
    await expect(createEntityOracle().exists(mockDb as never, kind, 5n)).resolves.toBe(false);
  });
});

import { describe, it, expect } from "vitest";
import {
  createReportSchema,
  editReportSchema,
  reportsQuerySchema,
  REPORT_BODY_MAX_LENGTH,
} from "../../../src/validation/reports.js";
import { postMessageSchema } from "../../../src/validation/threads.js";

describe("createReportSchema", () => {
  const valid = { report_type: "spam", item_id: "G9", item_type: "project", body: "" };

  it("accepts an empty body", () => {
    expect(createReportSchema.safeParse(valid).success).toBe(true);
  });

  it("leaves item_type checking to the service", () => {
    expect(createReportSchema.safeParse({ ...valid, item_type: "team" }).success).toBe(true);
  });

  it("caps the body length", () => {
    expect(createReportSchema.safeParse({ ...valid, body: "a".repeat(REPORT_BODY_MAX_LENGTH) }).success).toBe(true);
    expect(createReportSchema.safeParse({ ...valid, body: "a".repeat(REPORT_BODY_MAX_LENGTH + 1) }).success).toBe(false);
  });

  it("requires report_type", () => {
    expect(createReportSchema.safeParse({ ...valid, report_type: "" }).success).toBe(false);
  });
});

describe("editReportSchema", () => {
  it("accepts an empty patch", () => {
    expect(editReportSchema.safeParse({}).success).toBe(true);
  });

  it("accepts null for both fields", () => {
    const result = editReportSchema.safeParse({ body: null, closed: null });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toEqual({ body: null, closed: null });
    }
  });

  it("rejects a non-boolean closed flag", () => {
    expect(editReportSchema.safeParse({ closed: "yes" }).success).toBe(false);
  });
});

describe("reportsQuerySchema", () => {
  it("defaults count to 100 and all to true", () => {
    const result = reportsQuerySchema.safeParse({});
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toEqual({ count: 100, all: true });
    }
  });

  it("parses all=false", () => {
    const result = reportsQuerySchema.safeParse({ count: "2", all: "false" });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toEqual({ count: 2, all: false });
    }
  });

  it("bounds count", () => {
    expect(reportsQuerySchema.safeParse({ count: "0" }).success).toBe(false);
    expect(reportsQuerySchema.safeParse({ count: "1001" }).success).toBe(false);
  });

  it("rejects other values for all", () => {
    expect(reportsQuerySchema.safeParse({ all: "yes" }).success).toBe(false);
  });
});

describe("postMessageSchema", () => {
  it("trims the message", () => {
    const result = postMessageSchema.safeParse({ body: "  hi  " });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.body).toBe("hi");
    }
  });

  it("rejects a blank message", () => {
    expect(postMessageSchema.safeParse({ body: "  " }).success).toBe(false);
  });
});

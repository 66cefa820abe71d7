import { describe, it, expect, afterEach } from "vitest";
import { FormatterFactory, createFormatter } from "./formatter-factory";
import { CSVFormatter } from "./csv-formatter";
import type { IFormatter } from "./base/formatter-interface";
import { UnsupportedFormatError } from "../types/errors";

const stubFormatter: IFormatter = {
  name: "stub",
  geom: false,
  mimetype: "text/plain",
  extension: "txt",
  write: () => Buffer.from("stub"),
};

describe("FormatterFactory", () => {
  afterEach(() => {
    FormatterFactory.unregisterFormatter("stub");
  });

  describe("getSupportedFormats", () => {
    it("should list the csv format", () => {
      expect(FormatterFactory.getSupportedFormats()).toEqual(["csv"]);
    });
  });

  describe("createFormatter", () => {
    it("should create a CSV formatter", () => {
      const formatter = FormatterFactory.createFormatter("csv");

      expect(formatter).toBeInstanceOf(CSVFormatter);
      expect(formatter.geom).toBe(false);
    });

    it("should pass the definition through and ignore name case", () => {
      const formatter = FormatterFactory.createFormatter("CSV", { geom: true });

      expect(formatter).toBeInstanceOf(CSVFormatter);
      expect(formatter.geom).toBe(true);
    });

    it("should return a new instance on every call", () => {
      expect(FormatterFactory.createFormatter("csv")).not.toBe(
        FormatterFactory.createFormatter("csv"),
      );
    });

    it("should throw for unknown formats", () => {
      expect(() =>
        FormatterFactory.createFormatter("xml", {}, "test-correlation-id"),
      ).toThrow(new UnsupportedFormatError("xml", ["csv"], "test-correlation-id"));
    });

    it("should list the supported formats in the error", () => {
      try {
        FormatterFactory.createFormatter("xml");
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(UnsupportedFormatError);
        expect(error).toMatchObject({
          message: "Unsupported output format: xml. Supported formats: csv",
          formatName: "xml",
          supportedFormats: ["csv"],
        });
      }
    });
  });

  describe("registerFormatter", () => {
    it("should make a registered formatter available", () => {
      FormatterFactory.registerFormatter("stub", () => stubFormatter);

      expect(FormatterFactory.isFormatSupported("stub")).toBe(true);
      expect(FormatterFactory.createFormatter("Stub")).toBe(stubFormatter);
      expect(FormatterFactory.getSupportedFormats()).toEqual(["csv", "stub"]);
    });

    it("should remove an unregistered formatter", () => {
      FormatterFactory.registerFormatter("stub", () => stubFormatter);
      FormatterFactory.unregisterFormatter("STUB");

      expect(FormatterFactory.isFormatSupported("stub")).toBe(false);
    });
  });
});

describe("createFormatter", () => {
  it("should delegate to the factory", () => {
    const formatter = createFormatter("csv", { geom: true });

    expect(formatter.name).toBe("csv");
    expect(formatter.mimetype).toBe("text/csv; charset=utf-8");
    expect(formatter.geom).toBe(true);
  });
});

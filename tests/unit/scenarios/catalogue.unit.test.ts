import { describe, it, expect } from "vitest";
import { buildRequest } from "../../../src/request/builder";
import {
  BUILT_IN_SCENARIOS,
  UPLOAD_BOUNDARY,
  buildUploadRequest,
  listBuiltInScenarios,
} from "../../../src/scenarios/catalogue";
import { filterScenarios } from "../../../src/scenarios/selection";
import { ConfigError } from "../../../src/config/run-config";

const target = { host: "localhost", port: 8080 };

const byId = (id: string) => {
  const scenario = listBuiltInScenarios(["parser", "upload"]).find((entry) => entry.id === id);
  if (!scenario) throw new Error(`missing scenario ${id}`);
  return scenario;
};

const headerValue = (headers: ReadonlyArray<readonly [string, string]>, name: string) =>
  headers.find(([key]) => key === name)?.[1];

const bodyText = (body: string | Uint8Array | undefined): string => {
  if (body === undefined) return "";
  return typeof body === "string" ? body : Buffer.from(body).toString("utf-8");
};

describe("scenarios", () => {
  describe("catalogue", () => {
    it("should list the parser suite before the upload suite", () => {
      expect(listBuiltInScenarios(["parser", "upload"]).map((scenario) => scenario.id)).toEqual([
        "get-static",
        "get-query",
        "post-form",
        "post-json",
        "delete-item",
        "directory-listing",
        "not-found",
        "many-headers",
        "invalid-method",
        "missing-version",
        "upload-small",
        "upload-large",
        "upload-multiple",
      ]);
      expect(BUILT_IN_SCENARIOS.parser.every((scenario) => scenario.timeoutMs === 5000)).toBe(true);
      expect(BUILT_IN_SCENARIOS.upload.every((scenario) => scenario.timeoutMs === 10000)).toBe(true);
    });

    it("should build the static file request with the target in the Host header", () => {
      const bytes = buildRequest(byId("get-static").build({ host: "127.0.0.1", port: 9000 }));

      expect(bytes.toString()).toBe(
        "GET /test.html HTTP/1.1\r\nHost: 127.0.0.1:9000\r\nUser-Agent: WireProbe/1.0\r\nAccept: text/html\r\nConnection: close\r\n\r\n"
      );
    });

    it("should give form bodies a matching Content-Length", () => {
      const spec = byId("post-form").build(target);

      expect(headerValue(spec.headers, "Content-Length")).toBe("46");
      expect(spec.body).toBe("name=John&email=john@example.com&message=Hello");
    });

    it("should keep the invalid method and missing version as written", () => {
      expect(buildRequest(byId("invalid-method").build(target)).toString()).toBe(
        "INVALID /test HTTP/1.1\r\nHost: localhost:8080\r\nConnection: close\r\n\r\n"
      );
      expect(buildRequest(byId("missing-version").build(target)).toString()).toBe(
        "GET /test\r\nHost: localhost:8080\r\n\r\n"
      );
    });

    it("should send nine headers for the many-headers scenario", () => {
      const spec = byId("many-headers").build(target);

      expect(spec.headers.map(([name]) => name)).toEqual([
        "Host",
        "User-Agent",
        "Accept",
        "Accept-Language",
        "Accept-Encoding",
        "DNT",
        "Connection",
        "Upgrade-Insecure-Requests",
        "Cache-Control",
      ]);
    });

    it("should encode the small upload as one text/plain file part", () => {
      const spec = byId("upload-small").build(target);
      const body =
        `--${UPLOAD_BOUNDARY}\r\n` +
        'Content-Disposition: form-data; name="file"; filename="hello.txt"\r\n' +
        "Content-Type: text/plain\r\n\r\n" +
        "Hello, World!\nThis is a test file.\r\n" +
        `--${UPLOAD_BOUNDARY}--\r\n`;

      expect(spec.method).toBe("POST");
      expect(spec.target).toBe("/upload");
      expect(bodyText(spec.body)).toBe(body);
      expect(headerValue(spec.headers, "Content-Type")).toBe(`multipart/form-data; boundary=${UPLOAD_BOUNDARY}`);
      expect(headerValue(spec.headers, "Content-Length")).toBe(String(Buffer.byteLength(body)));
    });

    it("should count bytes, not characters, for multi-byte uploads", () => {
      const spec = buildUploadRequest(target, [
        { name: "file1", filename: "a.txt", content: "première" },
        { name: "file2", filename: "b.txt", content: "二番目" },
      ]);
      const text = bodyText(spec.body);
      const length = Buffer.byteLength(text, "utf-8");

      expect(headerValue(spec.headers, "Content-Length")).toBe(String(length));
      expect(text.length).toBeLessThan(length);
    });

    it("should filter scenarios by id and keep catalogue order", () => {
      const all = listBuiltInScenarios(["parser"]);

      expect(filterScenarios(all, ["not-found", "get-static"]).map((scenario) => scenario.id)).toEqual([
        "get-static",
        "not-found",
      ]);
      expect(filterScenarios(all, [])).toBe(all);
      expect(() => filterScenarios(all, ["upload-small"])).toThrow(ConfigError);
    });
  });
});

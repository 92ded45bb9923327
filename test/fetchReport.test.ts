import { afterEach, describe, expect, it, vi } from "vitest";
import {
  AdmobReportTransport,
  buildReportRequest,
  fetchReportRows,
  normalizeAccountId,
  type ReportRequestBody,
  type ReportTransport,
} from "../src/report/fetchReport";
import { buildReportSpec } from "../src/report/reportSpecs";
import { ReportFetchError } from "../src/lib/errors";
import type { ReportChunk, ReportKind } from "../src/report/types";

class RecordingTransport implements ReportTransport {
  calls: Array<{ accountId: string; kind: ReportKind; body: ReportRequestBody }> = [];

  constructor(private readonly chunks: ReportChunk[]) {}

  async generate(accountId: string, kind: ReportKind, body: ReportRequestBody) {
    this.calls.push({ accountId, kind, body });
    return this.chunks;
  }
}

describe("buildReportRequest", () => {
  it("expands dates into year/month/day parts", () => {
    const body = buildReportRequest(buildReportSpec("network", "2026-10-17"));
    expect(body.reportSpec.dateRange).toEqual({
      startDate: { year: 2026, month: 10, day: 17 },
      endDate: { year: 2026, month: 10, day: 17 },
    });
    expect(body.reportSpec.dimensions).toEqual(["DATE", "APP", "FORMAT", "AD_UNIT"]);
    expect(body.reportSpec.sortConditions).toEqual([{ dimension: "DATE", order: "ASCENDING" }]);
    expect(body.reportSpec.dimensionFilters).toBeUndefined();
  });

  it("adds an APP filter for a non-empty allow-list", () => {
    const body = buildReportRequest(buildReportSpec("mediation", "2026-10-17"), {
      appIds: ["ca-app-pub-0000~1", "ca-app-pub-0000~2"],
    });
    expect(body.reportSpec.dimensionFilters).toEqual([
      { dimension: "APP", matchesAny: { values: ["ca-app-pub-0000~1", "ca-app-pub-0000~2"] } },
    ]);
  });

  it("omits the filter for an empty allow-list", () => {
    const body = buildReportRequest(buildReportSpec("network", "2026-10-17"), { appIds: [] });
    expect(body.reportSpec.dimensionFilters).toBeUndefined();
  });
});

describe("normalizeAccountId", () => {
  it("strips the accounts/ prefix", () => {
    expect(normalizeAccountId("accounts/pub-123")).toBe("pub-123");
    expect(normalizeAccountId("pub-123")).toBe("pub-123");
  });
});

describe("fetchReportRows", () => {
  it("keeps only data chunks, in order", async () => {
    const transport = new RecordingTransport([
      { header: {} },
      { row: { dimensionValues: { DATE: { value: "20261017" } } } },
      { row: { dimensionValues: { DATE: { value: "20261018" } } } },
      { footer: {} },
    ]);
    const rows = await fetchReportRows(
      transport,
      "accounts/pub-123",
      "network",
      buildReportSpec("network", "2026-10-17")
    );

    expect(rows.map((row) => row.dimensionValues?.DATE?.value)).toEqual(["20261017", "20261018"]);
    expect(transport.calls).toHaveLength(1);
    expect(transport.calls[0]?.accountId).toBe("pub-123");
    expect(transport.calls[0]?.kind).toBe("network");
  });

  it("returns no rows for a header/footer-only response", async () => {
    const transport = new RecordingTransport([{ header: {} }, { footer: {} }]);
    const rows = await fetchReportRows(transport, "pub-1", "mediation", buildReportSpec("mediation", "2026-10-17"));
    expect(rows).toEqual([]);
  });
});

describe("AdmobReportTransport", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const credentials = { getAccessToken: async () => "test-token" };

  it("posts the report request with a bearer token", async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      new Response(JSON.stringify([{ header: {} }, { row: {} }]), { status: 200 })
    );
    vi.stubGlobal("fetch", fetchMock);

    const transport = new AdmobReportTransport(credentials, "https://example.test/v1");
    const body = buildReportRequest(buildReportSpec("mediation", "2026-10-17"));
    const chunks = await transport.generate("pub-123", "mediation", body);

    expect(chunks).toEqual([{ header: {} }, { row: {} }]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("https://example.test/v1/accounts/pub-123/mediationReport:generate");
    expect(init?.headers).toEqual({
      Authorization: "Bearer test-token",
      "Content-Type": "application/json",
    });
    expect(JSON.parse(String(init?.body))).toEqual(body);
  });

  it("throws ReportFetchError on a non-2xx response", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue(new Response("permission denied", { status: 403 }))
    );
    const transport = new AdmobReportTransport(credentials, "https://example.test/v1");
    const body = buildReportRequest(buildReportSpec("network", "2026-10-17"));

    const error = await transport.generate("pub-123", "network", body).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ReportFetchError);
    expect(error).toMatchObject({
      status: 403,
      body: "permission denied",
      message: "networkReport.generate failed (status 403)",
    });
  });

  it("rejects a payload that is not a chunk array", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue(new Response(JSON.stringify({ error: "x" }), { status: 200 }))
    );
    const transport = new AdmobReportTransport(credentials, "https://example.test/v1");
    const body = buildReportRequest(buildReportSpec("network", "2026-10-17"));
    await expect(transport.generate("pub-123", "network", body)).rejects.toThrow(
      "networkReport.generate returned an unexpected payload"
    );
  });
});

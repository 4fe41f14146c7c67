import { runExtraction } from "@src/extraction/business/run_extraction";
import { handler } from "../extract_reports";

const mockInfo = jest.fn();
const mockError = jest.fn();

jest.mock("@src/util/logger", () => ({
  withRequestContext: jest.fn(() => ({ info: mockInfo, error: mockError })),
}));

jest.mock("@src/extraction/config", () => ({
  loadExtractionConfig: jest.fn(() => ({ reportIds: ["rep-1"] })),
}));

jest.mock("@src/extraction/business/run_extraction", () => ({
  runExtraction: jest.fn(),
}));

describe("extract_reports handler", () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it("returns the extraction summary", async () => {
    const summary = { processed: 1, skipped: 0, results: [] };
    jest.mocked(runExtraction).mockResolvedValueOnce(summary);

    const res = await handler();

    expect(res.statusCode).toBe(200);
    expect(JSON.parse(res.body)).toEqual({ status: "ok", summary });
    expect(mockInfo).toHaveBeenCalledWith(
      { processed: 1, skipped: 0 },
      "extraction handler done"
    );
  });

  it("logs and rethrows a failed run", async () => {
    const err = new Error("bucket not found");
    jest.mocked(runExtraction).mockRejectedValueOnce(err);

    await expect(handler()).rejects.toBe(err);
    expect(mockError).toHaveBeenCalledWith(
      { err },
      "report extraction failed"
    );
    expect(mockInfo).not.toHaveBeenCalled();
  });
});

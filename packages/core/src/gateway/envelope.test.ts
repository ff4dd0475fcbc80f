import { describe, expect, it } from "vitest";
import { fakeRequest } from "../testing/requests.js";
import { computeMetadata, serializeSorted, wrapResponse } from "./envelope.js";

describe("computeMetadata", () => {
  it("links back to the request verbatim when the reply has no head", () => {
    const request = fakeRequest("http://localhost:8008/batch_status?id=aaa,bbb");
    expect(computeMetadata(request, {})).toEqual({
      link: "http://localhost:8008/batch_status?id=aaa,bbb",
    });
  });

  it("treats an empty head as no head", () => {
    const request = fakeRequest("http://localhost:8008/blocks/b1");
    expect(computeMetadata(request, { head_id: "" })).toEqual({
      link: "http://localhost:8008/blocks/b1",
    });
  });

  it("pins the reported head first and keeps the other parameters", () => {
    const request = fakeRequest("http://localhost:8008/state?head=abc&address=000000");
    expect(computeMetadata(request, { head_id: "def" })).toEqual({
      head: "def",
      link: "http://localhost:8008/state?head=def&address=000000",
    });
  });

  it("adds a head to a link that had no query", () => {
    const request = fakeRequest("https://ledger.test/blocks");
    expect(computeMetadata(request, { head_id: "h9" })).toEqual({
      head: "h9",
      link: "https://ledger.test/blocks?head=h9",
    });
  });

  it("keeps raw query parts in their original order", () => {
    const request = fakeRequest("http://localhost:8008/batches?id=c1,c2&head=old&x=a%20b");
    expect(computeMetadata(request, { head_id: "new" }).link).toBe(
      "http://localhost:8008/batches?head=new&id=c1,c2&x=a%20b",
    );
  });
});

describe("wrapResponse", () => {
  it("omits data when there is none", () => {
    const response = wrapResponse({ metadata: { link: "http://h/x" }, status: 201 });
    expect(response.status).toBe(201);
    expect(response.contentType).toBe("application/json");
    expect(JSON.parse(response.body)).toEqual({ link: "http://h/x" });
  });

  it("keeps falsy data", () => {
    expect(JSON.parse(wrapResponse({ data: "" }).body)).toEqual({ data: "" });
  });

  it("sorts keys and indents by two spaces", () => {
    const response = wrapResponse({
      data: { zeta: 1, alpha: { y: 2, b: 3 } },
      metadata: { link: "http://h/x", head: "h" },
    });
    expect(response.body).toBe(
      [
        "{",
        '  "data": {',
        '    "alpha": {',
        '      "b": 3,',
        '      "y": 2',
        "    },",
        '    "zeta": 1',
        "  },",
        '  "head": "h",',
        '  "link": "http://h/x"',
        "}",
      ].join("\n"),
    );
  });
});

describe("serializeSorted", () => {
  it("keeps array order", () => {
    expect(serializeSorted({ b: [3, 1], a: [] })).toBe('{\n  "a": [],\n  "b": [\n    3,\n    1\n  ]\n}');
  });
});

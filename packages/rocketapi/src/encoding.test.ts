import { describe, expect, it } from "vitest";
import { encodeRequestPayload } from "./encoding.js";

describe("encodeRequestPayload", () => {
  it("writes bigint ids as bare JSON numbers", () => {
    expect(encodeRequestPayload({ id: 18446744073709551615n })).toBe('{"id":18446744073709551615}');
  });

  it("drops undefined and null entries", () => {
    expect(encodeRequestPayload({ id: 1n, max_id: undefined, page: null, count: 12 })).toBe(
      '{"id":1,"count":12}',
    );
  });

  it("escapes strings and keeps booleans", () => {
    expect(encodeRequestPayload({ query: 'say "hi"\n', can_support_threading: false })).toBe(
      '{"query":"say \\"hi\\"\\n","can_support_threading":false}',
    );
  });

  it("encodes id lists", () => {
    expect(encodeRequestPayload({ ids: [1n, 9007199254740993n] })).toBe(
      '{"ids":[1,9007199254740993]}',
    );
  });
});

import { describe, it, expect } from "vitest";
import { fieldsWithout, keyOf, ownKey, recordBuild, recordFields, recordKey } from "./capabilities.js";
import type { Keyed } from "./types.js";

interface User {
  id: string;
  name: string;
  age: number;
}

const alice: User = { id: "u1", name: "Alice", age: 31 };

describe("record capabilities", () => {
  it("should wrap plain functions", () => {
    const byAge = recordKey((user: User) => user.age);
    const names = recordFields((user: User) => ({ name: user.name }));
    const rebuild = recordBuild((id: string, rest: { name: string; age: number }) => ({ id, ...rest }));

    expect(byAge.key(alice)).toBe(31);
    expect(names.fields(alice)).toEqual({ name: "Alice" });
    expect(rebuild.build("u2", { name: "Bob", age: 40 })).toEqual({ id: "u2", name: "Bob", age: 40 });
  });

  it("should key one record type several ways", () => {
    const byId = keyOf<User, "id">("id");
    const byAge = keyOf<User, "age">("age");

    expect(byId.key(alice)).toBe("u1");
    expect(byAge.key(alice)).toBe(31);
  });

  it("should drop the key property from fields", () => {
    const rest = fieldsWithout<User, "id">("id");
    expect(rest.fields(alice)).toEqual({ name: "Alice", age: 31 });
    expect(alice).toEqual({ id: "u1", name: "Alice", age: 31 });
  });

  it("should adapt records that carry their own key", () => {
    class Version implements Keyed<[number, number]> {
      constructor(
        readonly major: number,
        readonly minor: number
      ) {}

      key(): [number, number] {
        return [this.major, this.minor];
      }
    }

    const capability = ownKey<Version, [number, number]>();
    expect(capability.key(new Version(2, 5))).toEqual([2, 5]);
  });
});

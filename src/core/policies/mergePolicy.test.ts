import { describe, expect, it } from "vitest";
import { mergeChanges, type MergePolicy } from "./mergePolicy";

type Listing = {
  name: string;
  company: string | null;
  url: string | null;
};

const policy: MergePolicy<Listing> = {
  name: "keep",
  company: "fillIfBlank",
  url: "overwrite",
};

describe("mergeChanges", () => {
  it("fills blank fields and leaves kept ones alone", () => {
    const changes = mergeChanges<Listing>(
      { name: "Old name", company: "  ", url: null },
      { name: "New name", company: "Acme SA", url: "https://acme.test" },
      policy,
    );

    expect(changes).toEqual({ company: "Acme SA", url: "https://acme.test" });
  });

  it("does not overwrite a populated fillIfBlank field or apply blank input", () => {
    const changes = mergeChanges<Listing>(
      { name: "Acme", company: "Acme SA", url: "https://old.test" },
      { company: "Other SA", url: "" },
      policy,
    );

    expect(changes).toEqual({});
  });

  it("reports nothing when the overwrite value is unchanged", () => {
    expect(
      mergeChanges<Listing>(
        { name: "Acme", company: null, url: "https://acme.test" },
        { url: "https://acme.test" },
        policy,
      ),
    ).toEqual({});
  });
});

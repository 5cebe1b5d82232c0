import { describe, it, expect, vi } from "vitest";
import {
  AggregatedDiffRunner,
  AggregatedList,
  ParamsNotFoundError,
  UnknownDiffBucketError,
  type DiffBucket,
} from "./aggregated-list.js";

type Params = { [key: string]: string };

function list(...entries: Array<[Params, string[]]>): AggregatedList<Params, string> {
  const result = new AggregatedList<Params, string>();
  for (const [params, items] of entries) {
    result.add(params, items);
  }
  return result;
}

const ORG = { service: "github-org", org: "acme" };
const TEAM = { service: "github-org-team", org: "acme", team: "sre" };

describe("AggregatedList", () => {
  it("should merge items added under the same params without duplicates", () => {
    const aggregated = list([ORG, ["alice", "bob"]], [{ org: "acme", service: "github-org" }, ["bob", "carol"]]);

    expect(aggregated.size).toBe(1);
    expect(aggregated.get(ORG)).toEqual({ params: ORG, items: ["alice", "bob", "carol"] });
  });

  it("should deduplicate items within one add", () => {
    expect(list([ORG, ["alice", "alice"]]).get(ORG).items).toEqual(["alice"]);
  });

  it("should look elements up by params hash", () => {
    const aggregated = list([TEAM, ["alice"]]);
    const hash = AggregatedList.hashParams(TEAM);

    expect(aggregated.getByParamsHash(hash).items).toEqual(["alice"]);
    expect(() => aggregated.getByParamsHash("missing")).toThrow(ParamsNotFoundError);
    expect(() => aggregated.get({ service: "other" })).toThrow(ParamsNotFoundError);
  });

  it("should hash params independently of key order", () => {
    expect(AggregatedList.hashParams({ a: 1, b: "x" })).toBe(AggregatedList.hashParams({ b: "x", a: 1 }));
  });

  it("should dump copies of all elements", () => {
    const aggregated = list([ORG, ["alice"]], [TEAM, []]);
    const dumped = aggregated.dump();
    dumped[0].items.push("mallory");

    expect(dumped).toHaveLength(2);
    expect(aggregated.get(ORG).items).toEqual(["alice"]);
  });

  it("should dump in the same order whatever the insertion order", () => {
    const forward = list([ORG, ["bob", "alice"]], [TEAM, ["carol"]]);
    const backward = list([TEAM, ["carol"]], [ORG, ["alice"]], [ORG, ["bob"]]);

    expect(backward.sortedDump()).toEqual(forward.sortedDump());
    expect(forward.sortedDump().find((element) => element.params.service === "github-org")?.items).toEqual([
      "alice",
      "bob",
    ]);
  });

  describe("diff", () => {
    it("should classify inserts, deletes and updates", () => {
      const current = list([ORG, ["alice", "bob"]], [TEAM, ["alice"]]);
      const desired = list([ORG, ["bob", "carol"]], [{ service: "github-org-team", org: "acme", team: "dev" }, ["dave"]]);

      expect(current.diff(desired)).toEqual({
        insert: [{ params: { service: "github-org-team", org: "acme", team: "dev" }, items: ["dave"] }],
        delete: [{ params: TEAM, items: ["alice"] }],
        "update-insert": [{ params: ORG, items: ["carol"] }],
        "update-delete": [{ params: ORG, items: ["alice"] }],
      });
    });

    it("should be empty for identical lists", () => {
      const current = list([ORG, ["alice", "bob"]]);
      const desired = list([ORG, ["bob", "alice"]]);

      expect(current.diff(desired)).toEqual({
        insert: [],
        delete: [],
        "update-insert": [],
        "update-delete": [],
      });
    });

    it("should report every element as insert against an empty list", () => {
      const desired = list([ORG, ["alice"]]);
      expect(new AggregatedList<Params, string>().diff(desired).insert).toEqual([{ params: ORG, items: ["alice"] }]);
    });
  });
});

describe("AggregatedDiffRunner", () => {
  const current = list([ORG, ["alice"]], [TEAM, ["bob"]]);
  const desired = list([ORG, ["alice", "carol"]], [{ service: "github-org-team", org: "acme", team: "dev" }, ["dave"]]);

  it("should call actions for matching elements in registration order", async () => {
    const calls: string[] = [];
    const runner = new AggregatedDiffRunner(current.diff(desired));
    runner.register("update-insert", (params, items) => {
      calls.push(`update-insert ${params.org} ${items.join(",")}`);
    });
    runner.register("insert", async (params, items) => {
      calls.push(`insert ${params.team} ${items.join(",")}`);
    });
    runner.register("delete", (params) => {
      calls.push(`delete ${params.team}`);
    });

    await runner.run();

    expect(calls).toEqual(["update-insert acme carol", "insert dev dave", "delete sre"]);
  });

  it("should skip elements rejected by the predicate", async () => {
    const action = vi.fn();
    const runner = new AggregatedDiffRunner(current.diff(desired));
    runner.register("insert", action, (params) => params.service === "github-org");

    await runner.run();

    expect(action).not.toHaveBeenCalled();
  });

  it("should narrow params with registerFor", async () => {
    const teams: string[] = [];
    const runner = new AggregatedDiffRunner(current.diff(desired));
    runner.registerFor(
      "insert",
      (params): params is Params & { team: string } => typeof params.team === "string",
      (params) => {
        teams.push(params.team);
      }
    );

    await runner.run();

    expect(teams).toEqual(["dev"]);
  });

  it("should propagate errors from actions", async () => {
    const runner = new AggregatedDiffRunner(current.diff(desired));
    runner.register("insert", () => {
      throw new Error("cannot create");
    });

    await expect(runner.run()).rejects.toThrow("cannot create");
  });

  it("should reject unknown buckets at runtime", () => {
    const runner = new AggregatedDiffRunner(current.diff(desired));
    const bucket = "upsert" as DiffBucket;
    expect(() => runner.register(bucket, vi.fn())).toThrow(UnknownDiffBucketError);
  });
});

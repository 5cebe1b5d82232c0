import { describe, it, expect } from "vitest";
import {
  LabelContainer,
  MissingLabelError,
  UnknownLabelTypeError,
  buildContainerForPrefix,
  buildLabelContainer,
  buildLabelFromDict,
  createOCMLabelStore,
  getOrgLabels,
  getSubscriptionLabels,
  labelFilter,
  organizationLabelsHref,
  subscriptionLabelsHref,
} from "./labels.js";
import { Filter } from "./search-filters.js";
import type { OCMLabel } from "./types.js";
import { createFakeOCMApi, labelPayload } from "./test-helpers.js";

function label(key: string, value: string, subscriptionId = "sub-1"): OCMLabel {
  return buildLabelFromDict(labelPayload({ key, value, subscriptionId }));
}

describe("buildLabelFromDict", () => {
  it("should build subscription labels", () => {
    expect(buildLabelFromDict(labelPayload({ key: "owner", value: "team-a", subscriptionId: "sub-9" }))).toEqual({
      id: "label-owner",
      internal: false,
      updatedAt: new Date("2024-01-01T00:00:00Z"),
      createdAt: new Date("2024-01-01T00:00:00Z"),
      href: "/api/accounts_mgmt/v1/labels/owner",
      key: "owner",
      value: "team-a",
      type: "Subscription",
      subscriptionId: "sub-9",
    });
  });

  it("should build organization and account labels", () => {
    const org = buildLabelFromDict(labelPayload({ key: "k", value: "v", organizationId: "org-7" }));
    const account = buildLabelFromDict(labelPayload({ key: "k", value: "v", type: "Account" }));

    expect(org).toMatchObject({ type: "Organization", organizationId: "org-7" });
    expect(account).toMatchObject({ type: "Account", accountId: "account-1" });
  });

  it("should reject unknown label types", () => {
    expect(() => buildLabelFromDict(labelPayload({ key: "k", value: "v", type: "Cluster" }))).toThrow(
      UnknownLabelTypeError
    );
    expect(() => buildLabelFromDict({ key: "k" })).toThrow("unknown label type: <missing>");
  });
});

describe("labelFilter", () => {
  it("should filter by key and optionally value", () => {
    expect(labelFilter("sre-capabilities.rhidp").render()).toBe("key='sre-capabilities.rhidp'");
    expect(labelFilter("sre-capabilities.rhidp", "enabled").render()).toBe(
      "key='sre-capabilities.rhidp' and value='enabled'"
    );
  });
});

describe("LabelContainer", () => {
  const container = buildLabelContainer([label("a", "1"), label("b", "2")]);

  it("should look labels up by key", () => {
    expect(container.size).toBe(2);
    expect(container.get("a")?.value).toBe("1");
    expect(container.get("missing")).toBeUndefined();
    expect(container.getLabelValue("b")).toBe("2");
    expect(container.getLabelValue("missing")).toBeUndefined();
  });

  it("should require labels", () => {
    expect(container.getRequiredLabel("a").value).toBe("1");
    expect(() => container.getRequiredLabel("missing")).toThrow(MissingLabelError);
    expect(() => container.getRequiredLabel("missing")).toThrow("Required label 'missing' does not exist.");
  });

  it("should expose values as a plain record", () => {
    expect(container.getValuesDict()).toEqual({ a: "1", b: "2" });
  });

  it("should let later lists override earlier ones", () => {
    const merged = buildLabelContainer([label("a", "org"), label("c", "org")], null, [label("a", "sub")]);
    expect(merged.getValuesDict()).toEqual({ a: "sub", c: "org" });
  });

  it("should be empty without labels", () => {
    expect(new LabelContainer().isEmpty).toBe(true);
    expect(buildLabelContainer().size).toBe(0);
  });

  it("should select labels by prefix", () => {
    const labels = buildLabelContainer([
      label("sre-capabilities.rhidp.status", "enabled"),
      label("sre-capabilities.rhidp.name", "sso"),
      label("owner", "team-a"),
    ]);

    expect(buildContainerForPrefix(labels, "sre-capabilities.rhidp.").getValuesDict()).toEqual({
      "sre-capabilities.rhidp.status": "enabled",
      "sre-capabilities.rhidp.name": "sso",
    });
    expect(buildContainerForPrefix(labels, "sre-capabilities.rhidp.", true).getValuesDict()).toEqual({
      status: "enabled",
      name: "sso",
    });
  });
});

describe("label lookup", () => {
  it("should restrict subscription label queries to the subscription type", async () => {
    const { api, calls } = createFakeOCMApi({
      "/api/accounts_mgmt/v1/labels": () => [
        labelPayload({ key: "owner", value: "team-a", subscriptionId: "sub-1" }),
      ],
    });

    const labels = [];
    for await (const found of getSubscriptionLabels(api, labelFilter("owner"))) {
      labels.push(found);
    }

    expect(labels.map((found) => found.subscriptionId)).toEqual(["sub-1"]);
    expect(calls).toEqual([{ apiPath: "/api/accounts_mgmt/v1/labels", search: "key='owner' and type='Subscription'" }]);
  });

  it("should group organization labels by organization", async () => {
    const { api, calls } = createFakeOCMApi({
      "/api/accounts_mgmt/v1/labels": () => [
        labelPayload({ key: "sre-capabilities.a", value: "1", organizationId: "org-1" }),
        labelPayload({ key: "sre-capabilities.b", value: "2", organizationId: "org-1" }),
        labelPayload({ key: "sre-capabilities.a", value: "3", organizationId: "org-2" }),
      ],
    });

    const byOrg = await getOrgLabels(api, ["org-2", "org-1"], new Filter().like("key", "sre-capabilities.%"));

    expect([...byOrg.keys()]).toEqual(["org-1", "org-2"]);
    expect(byOrg.get("org-1")?.getValuesDict()).toEqual({ "sre-capabilities.a": "1", "sre-capabilities.b": "2" });
    expect(calls[0].search).toBe(
      "key like 'sre-capabilities.%' and organization_id in ('org-1','org-2') and type='Organization'"
    );
  });

  it("should query org labels in chunks", async () => {
    const { api, calls } = createFakeOCMApi({ "/api/accounts_mgmt/v1/labels": () => [] });

    await getOrgLabels(api, ["o1", "o2", "o3"], null, 2);

    expect(calls.map((call) => call.search)).toEqual([
      "organization_id in ('o1','o2') and type='Organization'",
      "organization_id='o3' and type='Organization'",
    ]);
  });

  it("should not query without organizations", async () => {
    const { api } = createFakeOCMApi({});
    await expect(getOrgLabels(api, [])).resolves.toEqual(new Map());
    expect(api.getPaginated).not.toHaveBeenCalled();
  });
});

describe("label writes", () => {
  it("should build label container hrefs", () => {
    expect(organizationLabelsHref("org-1")).toBe("/api/accounts_mgmt/v1/organizations/org-1/labels");
    expect(subscriptionLabelsHref("/api/accounts_mgmt/v1/subscriptions/sub-1")).toBe(
      "/api/accounts_mgmt/v1/subscriptions/sub-1/labels"
    );
  });

  it("should map store operations to OCM requests", async () => {
    const { api } = createFakeOCMApi({});
    const store = createOCMLabelStore(api);
    const href = "/api/accounts_mgmt/v1/subscriptions/sub-1/labels";

    await store.addLabel(href, "owner", "team-a");
    await store.updateLabel(href, "owner", "team-b");
    await store.deleteLabel(href, "owner");

    expect(api.post).toHaveBeenCalledWith(href, { kind: "Label", key: "owner", value: "team-a" });
    expect(api.patch).toHaveBeenCalledWith(`${href}/owner`, { kind: "Label", key: "owner", value: "team-b" });
    expect(api.delete).toHaveBeenCalledWith(`${href}/owner`);
  });
});

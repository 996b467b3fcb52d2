import { beforeEach, describe, it, expect, vi } from "vitest";
import type { BannerbearTemplateSummary } from "~/services/bannerbear.server";
import { loadCatalog, resetCatalogCache, type CatalogClient } from "~/services/design/template-catalog.server";
import type { Template } from "~/services/design/types";
import { JUST_LISTED, JUST_SOLD } from "../helpers/design-fixtures";

function fakeCatalogClient(summaries: BannerbearTemplateSummary[], details: Record<string, Template>) {
  const listTemplates = vi.fn(async () => summaries);
  const getTemplate = vi.fn(async (uid: string): Promise<Template> => {
    const detail = details[uid];
    if (!detail) throw new Error(`no detail for ${uid}`);
    return detail;
  });
  const client: CatalogClient = { listTemplates, getTemplate };
  return { client, listTemplates, getTemplate };
}

describe("template-catalog", () => {
  beforeEach(() => {
    resetCatalogCache();
  });

  it("loads every template detail and skips the ones that fail", async () => {
    const { client } = fakeCatalogClient(
      [
        { uid: "tpl-listed", name: "Just Listed Flyer" },
        { uid: "tpl-missing", name: null },
        { uid: "tpl-sold", name: "Just Sold Banner" },
      ],
      { "tpl-listed": JUST_LISTED, "tpl-sold": JUST_SOLD }
    );

    await expect(loadCatalog({ client })).resolves.toEqual([JUST_LISTED, JUST_SOLD]);
  });

  it("caches a successful load", async () => {
    const { client, listTemplates } = fakeCatalogClient([{ uid: "tpl-listed", name: null }], {
      "tpl-listed": JUST_LISTED,
    });

    await loadCatalog({ client });
    await loadCatalog({ client });

    expect(listTemplates).toHaveBeenCalledTimes(1);
  });

  it("returns null when not configured", async () => {
    await expect(loadCatalog({ client: null })).resolves.toBeNull();
  });

  it("returns null when the summary call fails and does not cache the failure", async () => {
    const { client, listTemplates } = fakeCatalogClient([{ uid: "tpl-listed", name: null }], {
      "tpl-listed": JUST_LISTED,
    });
    listTemplates.mockRejectedValueOnce(new Error("HTTP 500"));

    await expect(loadCatalog({ client })).resolves.toBeNull();
    await expect(loadCatalog({ client })).resolves.toEqual([JUST_LISTED]);
  });

  it("returns null when no detail could be loaded", async () => {
    const { client } = fakeCatalogClient([{ uid: "tpl-x", name: null }], {});
    await expect(loadCatalog({ client })).resolves.toBeNull();
  });
});

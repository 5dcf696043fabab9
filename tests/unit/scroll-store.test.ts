import { describe, expect, it } from "vitest";
import { InfrastructureError } from "../../src/lib/errors";
import { MemoryStore } from "../../src/lib/store/memory";
import { addScholar, createStore, paperInput, policy, reviewInput, submitScroll } from "./fixtures";

describe("scroll submission", () => {
  it("numbers scrolls per year", () => {
    const { store } = createStore();
    const author = addScholar(store, "Author");
    expect(submitScroll(store, author).id).toBe("AX-2026-00001");
    expect(submitScroll(store, author).id).toBe("AX-2026-00002");

    const nextYear = new MemoryStore(store.snapshotState(), { clock: () => new Date("2027-01-02T00:00:00.000Z") });
    expect(submitScroll(nextYear, author).id).toBe("AX-2027-00001");
    expect(submitScroll(nextYear, author).id).toBe("AX-2027-00002");
  });

  it("desk-rejects a scroll that fails screening and records why", () => {
    const { store } = createStore();
    const author = addScholar(store, "Author");
    const { scroll, errors } = store.submitScroll(paperInput({ title: "", abstract: "Too short.", authors: [author] }), author, policy);

    expect(errors.map((e) => e.rule)).toEqual(["title_required", "abstract_too_short"]);
    expect(errors[1].message).toBe("Abstract must be at least 50 characters (got 10)");
    expect(scroll?.status).toBe("desk_rejected");
    expect(scroll?.screeningErrors).toEqual(errors);

    const events = store.listAuditEvents({ targetId: scroll?.id });
    expect(events.map((e) => e.action)).toEqual(["scroll_submitted", "scroll_status_changed"]);
    expect(events[1].details).toEqual({ from: "submitted", to: "desk_rejected", transition: "screen_fail" });
  });

  it("stores the submitter as first author after screening the listed authors", () => {
    const { store } = createStore();
    const submitter = addScholar(store, "Submitter");
    const coAuthor = addScholar(store, "Co-author");
    const { scroll, errors } = store.submitScroll(paperInput({ authors: [coAuthor, submitter] }), submitter, policy);
    expect(errors).toEqual([]);
    expect(scroll?.status).toBe("under_review");
    expect(store.getAuthors(scroll?.id ?? "")).toEqual([submitter, coAuthor]);
  });

  it("desk-rejects a submission that lists no authors", () => {
    const { store } = createStore();
    const submitter = addScholar(store, "Submitter");
    const { scroll, errors } = store.submitScroll(paperInput({ authors: [] }), submitter, policy);
    expect(errors).toEqual([{ rule: "authors_required", message: "At least one author is required" }]);
    expect(scroll?.status).toBe("desk_rejected");
    expect(store.getAuthors(scroll?.id ?? "")).toEqual([submitter]);
  });

  it("refuses unknown and suspended submitters", () => {
    const { store } = createStore();
    expect(store.submitScroll(paperInput(), "scholar_missing", policy).errors.map((e) => e.rule)).toEqual([
      "submitter_not_found"
    ]);

    const author = addScholar(store, "Author");
    store.applySanction({ scholarId: author, type: "submission_suspension", reason: "test" });
    const { scroll, errors } = store.submitScroll(paperInput(), author, policy);
    expect(scroll).toBeNull();
    expect(errors.map((e) => e.rule)).toEqual(["submitter_suspended"]);
    expect(store.state.scrolls).toEqual([]);
  });
});

describe("revisions", () => {
  function scrollNeedingRevision() {
    const { store } = createStore();
    const author = addScholar(store, "Author");
    const scroll = submitScroll(store, author);
    store.submitReview(scroll.id, addScholar(store, "Reviewer one"), reviewInput(5, "major_revisions"), policy);
    store.submitReview(scroll.id, addScholar(store, "Reviewer two"), reviewInput(5, "major_revisions"), policy);
    return { store, author, scroll };
  }

  it("hides scrolls from scholars who are not authors", () => {
    const { store, scroll } = scrollNeedingRevision();
    const stranger = addScholar(store, "Stranger");
    expect(store.reviseScroll(scroll.id, stranger, { changeSummary: "x" }).errors.map((e) => e.rule)).toEqual([
      "scroll_not_found"
    ]);
  });

  it("only accepts revisions while revisions are required", () => {
    const { store } = createStore();
    const author = addScholar(store, "Author");
    const scroll = submitScroll(store, author);
    const result = store.reviseScroll(scroll.id, author, { changeSummary: "Early fix." });
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatchObject({ rule: "scroll_not_awaiting_revision", details: { status: "under_review" } });
  });

  it("validates revised references", () => {
    const { store, author, scroll } = scrollNeedingRevision();
    const result = store.reviseScroll(scroll.id, author, { references: ["AX-2026-00099"] });
    expect(result.errors).toEqual([{ rule: "invalid_references", message: "Unknown cited scroll IDs: AX-2026-00099" }]);
    expect(store.getScroll(scroll.id)?.version).toBe(1);
  });

  it("rejects unknown patch fields", () => {
    const { store, author, scroll } = scrollNeedingRevision();
    const patch = { changeSummary: "x", status: "published" };
    const result = store.reviseScroll(scroll.id, author, patch);
    expect(result.errors.map((e) => e.rule)).toEqual(["invalid_payload"]);
  });

  it("bumps the version and sends the scroll back to review", () => {
    const { store, author, scroll } = scrollNeedingRevision();
    const result = store.reviseScroll(scroll.id, author, {
      content: `${scroll.content} Added a second experiment.`,
      changeSummary: "Added a second experiment."
    });
    expect(result.errors).toEqual([]);
    expect(result.scroll).toMatchObject({ version: 2, status: "under_review" });
    expect(result.scroll?.revisionHistory).toEqual([
      { version: 2, timestamp: expect.any(String), changeSummary: "Added a second experiment.", responseLetter: [] }
    ]);
    const event = store.listAuditEvents({ targetId: scroll.id, action: "revision_submitted" })[0];
    expect(event.details).toEqual({
      from: "revisions_required",
      to: "under_review",
      transition: "revise",
      version: 2,
      changeSummary: "Added a second experiment."
    });
  });
});

describe("retraction and flags", () => {
  it("retracts an active scroll once", () => {
    const { store } = createStore();
    const author = addScholar(store, "Author");
    const scroll = submitScroll(store, author);

    expect(store.retractScroll(scroll.id, author, "  ").errors.map((e) => e.rule)).toEqual(["invalid_payload"]);

    const { scroll: retracted } = store.retractScroll(scroll.id, author, " Data error found. ");
    expect(retracted).toMatchObject({ status: "retracted", retractionReason: "Data error found." });

    const again = store.retractScroll(scroll.id, author, "Again");
    expect(again.errors.map((e) => e.rule)).toEqual(["scroll_not_retractable"]);
  });

  it("cannot retract a desk-rejected scroll", () => {
    const { store } = createStore();
    const author = addScholar(store, "Author");
    const scroll = submitScroll(store, author, { title: "" });
    expect(store.retractScroll(scroll.id, author, "Withdrawn").errors.map((e) => e.rule)).toEqual(["scroll_not_retractable"]);
  });

  it("flags a scroll and still allows retraction", () => {
    const { store } = createStore();
    const author = addScholar(store, "Author");
    const scroll = submitScroll(store, author);

    const flagged = store.flagScroll(scroll.id, "Duplicated figures");
    expect(flagged.scroll).toMatchObject({ status: "flagged", badges: ["integrity_flagged"] });
    expect(store.flagScroll(scroll.id, "Again").errors.map((e) => e.rule)).toEqual(["scroll_not_flaggable"]);
    expect(store.listAuditEvents({ targetId: scroll.id, action: "scroll_flagged" })[0]).toMatchObject({
      actorId: "integrity_agent",
      details: { from: "under_review", to: "flagged", reason: "Duplicated figures" }
    });

    expect(store.retractScroll(scroll.id, author, "Figures were duplicated").scroll?.status).toBe("retracted");
  });
});

describe("citations", () => {
  it("counts forward citations and traces lineage", () => {
    const { store } = createStore();
    const author = addScholar(store, "Author");
    const first = submitScroll(store, author, { title: "Foundations" });
    const second = submitScroll(store, author, { title: "Extension", references: [first.id] });
    const third = submitScroll(store, author, { title: "Synthesis", references: [first.id, second.id, first.id] });

    expect(store.getScroll(first.id)?.citationCount).toBe(2);
    expect(store.getScroll(second.id)?.citationCount).toBe(1);
    expect(store.forwardCitations(first.id)).toEqual([second.id, third.id]);
    expect(store.backwardReferences(third.id)).toEqual([first.id, second.id]);

    expect(store.traceLineage(third.id)).toEqual({
      scrollId: third.id,
      title: "Synthesis",
      references: [
        { scrollId: first.id, title: "Foundations", references: [] },
        { scrollId: second.id, title: "Extension", references: [{ scrollId: first.id, truncated: true }] }
      ]
    });
    expect(store.traceLineage(third.id, 1)).toEqual({
      scrollId: third.id,
      title: "Synthesis",
      references: [
        { scrollId: first.id, truncated: true },
        { scrollId: second.id, truncated: true }
      ]
    });
    expect(store.traceLineage("AX-2026-00404")).toEqual({ scrollId: "AX-2026-00404", notFound: true });
  });

  it("does not record citations from desk-rejected scrolls", () => {
    const { store } = createStore();
    const author = addScholar(store, "Author");
    const cited = submitScroll(store, author);
    submitScroll(store, author, { abstract: "", references: [cited.id] });
    expect(store.getScroll(cited.id)?.citationCount).toBe(0);
    expect(store.state.citations).toEqual([]);
  });
});

describe("transactions", () => {
  it("restores the previous state when the unit of work throws", () => {
    const { store } = createStore();
    const author = addScholar(store, "Author");
    const before = store.snapshotState();

    expect(() =>
      store.transaction((tx) => {
        submitScroll(tx, author);
        throw new InfrastructureError("write failed");
      })
    ).toThrow(InfrastructureError);

    expect(store.snapshotState()).toEqual(before);
    expect(submitScroll(store, author).id).toBe("AX-2026-00001");
  });

  it("refuses snapshots from a newer schema", () => {
    const { store } = createStore();
    const snapshot = { ...store.snapshotState(), schemaVersion: 99 };
    expect(() => new MemoryStore(snapshot)).toThrow("State snapshot schema 99 is newer than supported schema 1");
  });
});

import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { existsSync, mkdirSync, readdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { loadConfig } from "../../src/config.js";
import type { AugmentConfig } from "../../src/config.js";
import {
  FieldNotFoundError,
  MissingCredentialsError,
  MissingSourceFieldError,
  NoteTypeNotFoundError,
} from "../../src/errors.js";
import { augmentPackage, buildUpdates } from "../../src/pipeline/file-pipeline.js";
import type { FileJob } from "../../src/pipeline/file-pipeline.js";
import type { PipelineDeps } from "../../src/pipeline/job.js";
import { formatPreviewLine } from "../../src/pipeline/job.js";
import {
  BASIC_TYPE,
  CLOZE_TYPE,
  createPackage,
  makeTempDir,
  readPackageEntries,
  readPackageNotes,
  removeDir,
} from "../helpers/collection.js";
import type { CollectionSpec } from "../helpers/collection.js";
import { StubGenerator, failingGenerator } from "../helpers/generators.js";
import { MemoryLogger } from "../helpers/logger.js";

function clozeCollection(generation: CollectionSpec["generation"]): CollectionSpec {
  return {
    generation,
    noteTypes: [CLOZE_TYPE, BASIC_TYPE],
    notes: [
      { id: 1, mid: CLOZE_TYPE.id, fields: ["Bonjour", "Extra", "", "Img"] },
      { id: 2, mid: CLOZE_TYPE.id, fields: ["Merci", "Extra", "Existing note", "Img"] },
      { id: 3, mid: CLOZE_TYPE.id, fields: ["Salut", "Extra", "  ", "Img"] },
      { id: 4, mid: BASIC_TYPE.id, fields: ["Front", "Back"] },
    ],
  };
}

describe("augmentPackage", () => {
  let tmpDir: string;
  let config: AugmentConfig;
  let logger: MemoryLogger;
  let generator: StubGenerator;

  function deps(overrides: Partial<PipelineDeps> = {}): PipelineDeps {
    return { config, logger, createGenerator: () => generator, ...overrides };
  }

  function job(input: string, overrides: Partial<FileJob> = {}): FileJob {
    return {
      input,
      output: join(tmpDir, "out.apkg"),
      noteType: "Cloze",
      targetField: "Notes",
      promptTemplate: "Analyze: {Text}",
      ...overrides,
    };
  }

  beforeEach(() => {
    tmpDir = makeTempDir();
    config = loadConfig({ workDir: join(tmpDir, "work"), concurrency: 2 }, {});
    logger = new MemoryLogger();
    generator = new StubGenerator((prompt) => `**Note** for ${prompt.replace("Analyze: ", "")}`);
  });

  afterEach(() => {
    removeDir(tmpDir);
  });

  it("should preview pending notes on a dry run without writing output", async () => {
    const input = await createPackage(tmpDir, "deck", { payload: "modern", collection: clozeCollection("modern") });

    const report = await augmentPackage(job(input, { dryRun: true }), deps({ createGenerator: failingGenerator }));

    assert.equal(report.dryRun, true);
    assert.equal(report.totalNotes, 3);
    assert.equal(report.pending, 2);
    assert.equal(report.alreadyDone, 1);
    assert.deepEqual(report.preview.map(formatPreviewLine), [
      "ID: 1 | Text: Bonjour...",
      "ID: 3 | Text: Salut...",
    ]);
    assert.equal(report.outputPath, null);
    assert.equal(existsSync(join(tmpDir, "out.apkg")), false);
  });

  it("should fill the target field of pending notes in a modern package", async () => {
    const input = await createPackage(tmpDir, "deck", {
      payload: "modern",
      collection: clozeCollection("modern"),
      media: { "0": "image bytes", media: "{\"0\": \"cat.png\"}" },
    });

    const report = await augmentPackage(job(input), deps());

    assert.equal(report.generated, 2);
    assert.equal(report.updated, 2);
    assert.deepEqual(report.failed, []);
    assert.equal(report.outputPath, join(tmpDir, "out.apkg"));
    assert.deepEqual(generator.prompts.sort(), ["Analyze: Bonjour", "Analyze: Salut"]);

    const notes = await readPackageNotes(join(tmpDir, "out.apkg"), "collection.anki21b");
    assert.equal(notes[0]?.flds, "Bonjour\x1fExtra\x1f<p><strong>Note</strong> for Bonjour</p>\x1fImg");
    assert.equal(notes[1]?.flds, "Merci\x1fExtra\x1fExisting note\x1fImg");
    assert.equal(notes[1]?.mod, 100);
    assert.equal(notes[2]?.flds, "Salut\x1fExtra\x1f<p><strong>Note</strong> for Salut</p>\x1fImg");
    assert.ok((notes[0]?.mod ?? 0) > 100);
    assert.equal(notes[3]?.flds, "Front\x1fBack");
  });

  it("should write both payloads and keep media, without scratch files", async () => {
    const input = await createPackage(tmpDir, "deck", {
      payload: "legacy",
      collection: clozeCollection("legacy"),
      media: { "0": "image bytes", media: "{}" },
    });

    await augmentPackage(job(input), deps());

    const output = join(tmpDir, "out.apkg");
    assert.deepEqual([...readPackageEntries(output).keys()].sort(), [
      "0",
      "collection.anki2",
      "collection.anki21b",
      "media",
    ]);
    const legacy = await readPackageNotes(output, "collection.anki2");
    const modern = await readPackageNotes(output, "collection.anki21b");
    assert.deepEqual(legacy, modern);
    assert.equal(legacy[0]?.flds, "Bonjour\x1fExtra\x1f<p><strong>Note</strong> for Bonjour</p>\x1fImg");
  });

  it("should leave the collection bytes unchanged when nothing is pending", async () => {
    const collection: CollectionSpec = {
      generation: "legacy",
      noteTypes: [CLOZE_TYPE],
      notes: [{ id: 1, mid: CLOZE_TYPE.id, fields: ["a", "b", "done", "d"] }],
    };
    const input = await createPackage(tmpDir, "deck", { payload: "legacy", collection });

    const report = await augmentPackage(job(input), deps({ createGenerator: failingGenerator }));

    assert.equal(report.updated, 0);
    assert.deepEqual(
      readPackageEntries(join(tmpDir, "out.apkg")).get("collection.anki2"),
      readPackageEntries(input).get("collection.anki2"),
    );
    assert.ok(logger.messages("info").includes("No updates needed."));
  });

  it("should find nothing pending when run again on its own output", async () => {
    const input = await createPackage(tmpDir, "deck", { payload: "modern", collection: clozeCollection("modern") });
    await augmentPackage(job(input), deps());

    const second = await augmentPackage(
      job(join(tmpDir, "out.apkg"), { output: join(tmpDir, "second.apkg"), dryRun: true }),
      deps(),
    );

    assert.equal(second.pending, 0);
    assert.equal(second.alreadyDone, 3);
  });

  it("should leave a failed note pending and update the rest", async () => {
    const input = await createPackage(tmpDir, "deck", { payload: "modern", collection: clozeCollection("modern") });
    generator = new StubGenerator((prompt) => {
      if (prompt.includes("Salut")) throw new Error("rate limited");
      return "ok";
    });

    const report = await augmentPackage(job(input), deps());

    assert.equal(report.updated, 1);
    assert.deepEqual(report.failed, [{ noteId: 3, excerpt: "Salut", reason: "rate limited" }]);

    const rerun = await augmentPackage(
      job(join(tmpDir, "out.apkg"), { output: join(tmpDir, "second.apkg"), dryRun: true }),
      deps(),
    );
    assert.deepEqual(rerun.preview.map((p) => p.noteId), [3]);
  });

  it("should apply nine of ten notes when one generation fails", async () => {
    const input = await createPackage(tmpDir, "deck", {
      payload: "modern",
      collection: {
        generation: "modern",
        noteTypes: [CLOZE_TYPE],
        notes: Array.from({ length: 10 }, (_, i) => ({
          id: i + 1,
          mid: CLOZE_TYPE.id,
          fields: [`Sentence ${i + 1}`, "", "", ""],
        })),
      },
    });
    generator = new StubGenerator((prompt) => {
      if (prompt === "Analyze: Sentence 7") throw new Error("quota exceeded");
      return "generated";
    });

    const report = await augmentPackage(job(input), deps());

    assert.equal(report.generated, 9);
    assert.equal(report.updated, 9);
    assert.deepEqual(report.failed.map((f) => f.noteId), [7]);

    const rerun = await augmentPackage(
      job(join(tmpDir, "out.apkg"), { output: join(tmpDir, "second.apkg"), dryRun: true }),
      deps(),
    );
    assert.deepEqual(rerun.preview.map(formatPreviewLine), ["ID: 7 | Text: Sentence 7..."]);
  });

  it("should remove only its own scratch directory from the work directory", async () => {
    const workDir = join(tmpDir, "work");
    mkdirSync(workDir, { recursive: true });
    writeFileSync(join(workDir, "thesis.txt"), "keep me");
    const input = await createPackage(tmpDir, "deck", { payload: "modern", collection: clozeCollection("modern") });

    await augmentPackage(job(input), deps());
    await assert.rejects(augmentPackage(job(input, { noteType: "Lapis" }), deps()), NoteTypeNotFoundError);

    assert.deepEqual(readdirSync(workDir), ["thesis.txt"]);
  });

  it("should open a streamed modern package larger than one megabyte", async () => {
    const input = await createPackage(tmpDir, "large", {
      payload: "modern",
      streamed: true,
      collection: {
        generation: "modern",
        noteTypes: [CLOZE_TYPE],
        notes: Array.from({ length: 48 }, (_, i) => ({
          id: i + 1,
          mid: CLOZE_TYPE.id,
          fields: [`Phrase ${i + 1}`, "y".repeat(32 * 1024), i === 0 ? "" : "done", ""],
        })),
      },
    });

    const report = await augmentPackage(job(input), deps());

    assert.equal(report.totalNotes, 48);
    assert.equal(report.updated, 1);
    const notes = await readPackageNotes(join(tmpDir, "out.apkg"), "collection.anki21b");
    assert.equal(
      notes[0]?.flds,
      `Phrase 1\x1f${"y".repeat(32 * 1024)}\x1f<p><strong>Note</strong> for Phrase 1</p>\x1f`,
    );
  });

  it("should skip notes with blank prompt sources when asked", async () => {
    const input = await createPackage(tmpDir, "deck", {
      payload: "modern",
      collection: {
        generation: "modern",
        noteTypes: [CLOZE_TYPE],
        notes: [
          { id: 1, mid: CLOZE_TYPE.id, fields: ["", "x", "", ""] },
          { id: 2, mid: CLOZE_TYPE.id, fields: ["Bonjour", "", "", ""] },
        ],
      },
    });

    const report = await augmentPackage(job(input, { skipEmptySources: true }), deps());

    assert.equal(report.skipped, 1);
    assert.equal(report.updated, 1);
    assert.deepEqual(generator.prompts, ["Analyze: Bonjour"]);
  });

  it("should only need credentials when there is something to generate", async () => {
    const input = await createPackage(tmpDir, "deck", { payload: "modern", collection: clozeCollection("modern") });
    const missingKey = (): never => {
      throw new MissingCredentialsError("GEMINI_API_KEY");
    };

    await augmentPackage(job(input, { dryRun: true }), deps({ createGenerator: missingKey }));
    await assert.rejects(augmentPackage(job(input), deps({ createGenerator: missingKey })), MissingCredentialsError);
    assert.equal(existsSync(join(tmpDir, "out.apkg")), false);
  });

  describe("fatal errors", () => {
    let input: string;

    beforeEach(async () => {
      input = await createPackage(tmpDir, "deck", { payload: "modern", collection: clozeCollection("modern") });
    });

    it("should reject an unknown note type", async () => {
      await assert.rejects(augmentPackage(job(input, { noteType: "Lapis" }), deps()), NoteTypeNotFoundError);
      assert.equal(existsSync(join(tmpDir, "out.apkg")), false);
    });

    it("should reject an unknown target field, listing the available ones", async () => {
      await assert.rejects(
        augmentPackage(job(input, { targetField: "Mnemonic" }), deps()),
        (err: unknown) =>
          err instanceof FieldNotFoundError &&
          err.message ===
            "Target field 'Mnemonic' not found in note type 'Cloze'. Available fields: Text, Back Extra, Notes, Image",
      );
      assert.equal(existsSync(join(tmpDir, "out.apkg")), false);
    });

    it("should reject a prompt naming a missing field before generating", async () => {
      await assert.rejects(
        augmentPackage(job(input, { promptTemplate: "{Text} {Reading}" }), deps()),
        MissingSourceFieldError,
      );
      assert.deepEqual(generator.prompts, []);
      assert.equal(existsSync(join(tmpDir, "out.apkg")), false);
    });
  });
});

describe("buildUpdates", () => {
  it("should pad short records and set the target position", () => {
    const updates = buildUpdates(
      [
        { id: 1, values: ["a"] },
        { id: 2, values: ["b", "c", "", "d"] },
      ],
      new Map([[1, "<p>x</p>"]]),
      { Text: 0, Extra: 1, Notes: 2, Image: 3 },
      2,
      () => 1234,
    );

    assert.deepEqual(updates, [{ id: 1, flds: "a\x1f\x1f<p>x</p>\x1f", mod: 1234 }]);
  });
});

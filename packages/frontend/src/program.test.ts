/**
 * Tests for the file-based entry point
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { parseBindingsFromFiles } from "./program.js";

const writeJson = (file: string, value: unknown): void => {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, JSON.stringify(value, null, 2));
};

const widgetTree = {
  items: [
    {
      kind: "mod",
      ident: "root",
      content: [
        {
          kind: "mod",
          ident: "ui",
          content: [
            { kind: "struct", ident: "Widget", fields: [] },
            {
              kind: "foreignMod",
              items: [
                {
                  kind: "fn",
                  ident: "Widget_show",
                  params: [
                    {
                      ident: "this",
                      ty: {
                        kind: "pointer",
                        mutable: true,
                        elem: { kind: "path", segments: ["root", "ui", "Widget"] },
                      },
                    },
                  ],
                },
              ],
            },
            {
              kind: "impl",
              selfTy: { kind: "path", segments: ["Widget"] },
              items: [{ ident: "show", calls: "Widget_show" }],
            },
          ],
        },
      ],
    },
  ],
};

describe("parseBindingsFromFiles", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "bridgewright-program-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should find the config above the tree and resolve the managed source beside it", () => {
    const treePath = path.join(tempDir, "gen", "tree.json");
    writeJson(treePath, widgetTree);
    writeJson(path.join(tempDir, "bridgewright.json"), {
      generate: ["ui::Widget"],
      managedSource: "src/bindings.ts",
      managedFunctions: [{ signature: "function onShow(w: Widget): void" }],
    });
    fs.mkdirSync(path.join(tempDir, "src"));
    fs.writeFileSync(
      path.join(tempDir, "src", "bindings.ts"),
      "export declare function onShow(w: Widget): void;\n"
    );

    const result = parseBindingsFromFiles(treePath);

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(
      result.value.toArray().map((entry) => `${entry.kind} ${entry.name.toCppName()}`)
    ).to.deep.equal([
      "stringConstructor make_string",
      "function onShow",
      "struct ui::Widget",
      "function ui::Widget_show",
    ]);
  });

  it("should use defaults when there is no config", () => {
    const treePath = path.join(tempDir, "tree.json");
    writeJson(treePath, { items: [] });

    const result = parseBindingsFromFiles(treePath);

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value.size).to.equal(1);
  });

  it("should honor an explicit config path", () => {
    const treePath = path.join(tempDir, "tree.json");
    writeJson(treePath, widgetTree);
    const configPath = path.join(tempDir, "configs", "strict.json");
    writeJson(configPath, { excludeUtilities: true, block: ["ui::Widget"] });

    const result = parseBindingsFromFiles(treePath, { configPath });

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value.toArray().map((entry) => entry.name.toCppName())).to.deep.equal([
      "ui::Widget_show",
    ]);
  });

  it("should classify the rest of a tree holding an unclassified item", () => {
    const treePath = path.join(tempDir, "tree.json");
    writeJson(treePath, {
      items: [
        {
          kind: "mod",
          ident: "root",
          content: [
            { kind: "trait", ident: "Drawable" },
            { kind: "struct", ident: "Good", fields: [] },
          ],
        },
      ],
    });
    writeJson(path.join(tempDir, "bridgewright.json"), { excludeUtilities: true });

    const originalWarn = console.warn;
    console.warn = () => undefined;
    let result: ReturnType<typeof parseBindingsFromFiles>;
    try {
      result = parseBindingsFromFiles(treePath);
    } finally {
      console.warn = originalWarn;
    }

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value.toArray().map((entry) => entry.name.toCppName())).to.deep.equal([
      "Good",
    ]);
  });

  it("should report a missing managed source", () => {
    const treePath = path.join(tempDir, "tree.json");
    writeJson(treePath, { items: [] });
    writeJson(path.join(tempDir, "bridgewright.json"), {
      managedSource: "missing.ts",
    });

    const result = parseBindingsFromFiles(treePath);

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error[0]?.code).to.equal("BRW9002");
  });

  it("should wrap a classification failure in a list", () => {
    const treePath = path.join(tempDir, "tree.json");
    writeJson(treePath, { items: [] });
    writeJson(path.join(tempDir, "bridgewright.json"), { generate: ["ui::Widget"] });

    const result = parseBindingsFromFiles(treePath);

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.map((d) => d.code)).to.deep.equal(["BRW2001"]);
  });

  it("should pass tree errors through", () => {
    const result = parseBindingsFromFiles(path.join(tempDir, "absent.json"));

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error[0]?.code).to.equal("BRW9101");
  });
});

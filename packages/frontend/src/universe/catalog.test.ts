/**
 * Tests for the declaration catalog
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  buildDeclarationCatalog,
  updateDeclarationCatalog,
} from "./catalog.js";

describe("Declaration catalog", () => {
  describe("buildDeclarationCatalog", () => {
    it("creates entities with stable ids and default signatures", () => {
      const result = buildDeclarationCatalog(
        [
          {
            name: "Point",
            members: [
              { name: "x", kind: "term" },
              {
                name: "moveBy",
                kind: "term",
                signatures: ["moveBy(dx: int)", "moveBy(dx: int, dy: int)"],
              },
            ],
          },
        ],
        { projectName: "geo" }
      );

      expect(result.ok).to.equal(true);
      if (!result.ok) return;

      const pointId = result.value.resolveName("Point");
      expect(pointId).to.deep.equal({ stableId: "geo:Point", name: "Point" });
      if (!pointId) return;

      const [x, moveBy] = result.value.getDeclarations(pointId);
      expect(x?.stableId).to.equal("geo:Point#term:x");
      expect(x?.signatures).to.deep.equal([
        { stableId: "geo:Point#term:x(0)", text: "x" },
      ]);
      expect(moveBy?.signatures.map((s) => s.stableId)).to.deep.equal([
        "geo:Point#term:moveBy(0)",
        "geo:Point#term:moveBy(1)",
      ]);
      expect(result.value.getByStableId("geo:Point")?.kind).to.equal("class");
    });

    it("keeps a type and a term of one name apart", () => {
      const result = buildDeclarationCatalog(
        [
          {
            name: "Money",
            members: [
              { name: "Currency", kind: "type" },
              { name: "Currency", kind: "term" },
            ],
          },
        ],
        { projectName: "p" }
      );
      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      const [asType, asTerm] = result.value.getDeclarations({
        stableId: "p:Money",
        name: "Money",
      });
      expect(asType?.stableId).to.equal("p:Money#type:Currency");
      expect(asTerm?.stableId).to.equal("p:Money#term:Currency");
    });

    it("lists class ids in declaration order", () => {
      const result = buildDeclarationCatalog(
        [
          { name: "Zebra", members: [] },
          { name: "Apple", members: [] },
        ],
        { projectName: "p" }
      );
      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value.getAllClassIds()).to.deep.equal([
        { stableId: "p:Zebra", name: "Zebra" },
        { stableId: "p:Apple", name: "Apple" },
      ]);
    });

    it("leaves flags undetermined when they could not be resolved", () => {
      const result = buildDeclarationCatalog(
        [
          {
            name: "Lazy",
            members: [{ name: "value", kind: "term", flagsUnresolved: true }],
          },
        ],
        { projectName: "p" }
      );
      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      const [value] = result.value.getDeclarations({
        stableId: "p:Lazy",
        name: "Lazy",
      });
      expect(value?.flags).to.equal(undefined);
    });

    it("resolves extends before implements", () => {
      const result = buildDeclarationCatalog(
        [
          { name: "Shape", members: [] },
          { name: "Named", kind: "interface", members: [] },
          {
            name: "Square",
            implements: ["Named"],
            extends: ["Shape"],
            members: [],
          },
        ],
        { projectName: "p" }
      );
      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(
        result.value.getHeritage({ stableId: "p:Square", name: "Square" })
      ).to.deep.equal([
        { kind: "extends", targetStableId: "p:Shape" },
        { kind: "implements", targetStableId: "p:Named" },
      ]);
    });

    it("reports duplicate class declarations", () => {
      const result = buildDeclarationCatalog(
        [
          { name: "Point", members: [] },
          { name: "Point", members: [] },
        ],
        { projectName: "p" }
      );
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.map((d) => d.code)).to.deep.equal(["SK2001"]);
      expect(result.error[0]?.message).to.equal(
        "Duplicate class declaration 'Point'"
      );
    });

    it("warns about unresolved heritage and drops the edge", () => {
      const result = buildDeclarationCatalog(
        [{ name: "Child", extends: ["Missing"], members: [] }],
        { projectName: "p" }
      );
      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value.diagnostics.map((d) => d.code)).to.deep.equal([
        "SK2002",
      ]);
      expect(result.value.diagnostics[0]?.severity).to.equal("warning");
      expect(result.value.diagnostics[0]?.message).to.equal(
        "Unresolved heritage target 'Missing' in 'Child'"
      );
      expect(
        result.value.getHeritage({ stableId: "p:Child", name: "Child" })
      ).to.deep.equal([]);
    });

    it("reports cyclic heritage", () => {
      const result = buildDeclarationCatalog(
        [
          { name: "A", extends: ["B"], members: [] },
          { name: "B", extends: ["A"], members: [] },
        ],
        { projectName: "p" }
      );
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.map((d) => d.message)).to.deep.equal([
        "Cyclic heritage: A -> B -> A",
      ]);
      expect(result.error[0]?.code).to.equal("SK2003");
    });
  });

  describe("updateDeclarationCatalog", () => {
    const base = buildDeclarationCatalog(
      [
        { name: "Base", members: [{ name: "a", kind: "term" }] },
        {
          name: "Leaf",
          extends: ["Base"],
          members: [{ name: "b", kind: "term" }],
        },
      ],
      { projectName: "p" }
    );

    it("replaces named classes and keeps the identity of the rest", () => {
      expect(base.ok).to.equal(true);
      if (!base.ok) return;

      const leafId = { stableId: "p:Leaf", name: "Leaf" };
      const baseId = { stableId: "p:Base", name: "Base" };
      const updated = updateDeclarationCatalog(base.value, [
        { name: "Base", members: [{ name: "a", kind: "term" }] },
      ]);
      expect(updated.ok).to.equal(true);
      if (!updated.ok) return;

      expect(updated.value.getDeclarations(leafId)[0]).to.equal(
        base.value.getDeclarations(leafId)[0]
      );
      expect(updated.value.getDeclarations(baseId)[0]).to.not.equal(
        base.value.getDeclarations(baseId)[0]
      );
      expect(updated.value.getAllClassIds().map((c) => c.name)).to.deep.equal(
        ["Base", "Leaf"]
      );
    });

    it("adds new classes that may extend existing ones", () => {
      if (!base.ok) return;
      const updated = updateDeclarationCatalog(base.value, [
        { name: "Twig", extends: ["Leaf"], members: [] },
      ]);
      expect(updated.ok).to.equal(true);
      if (!updated.ok) return;
      expect(updated.value.hasClass("p:Twig")).to.equal(true);
      expect(base.value.hasClass("p:Twig")).to.equal(false);
      expect(updated.value.getAllClassIds()).to.deep.equal([
        { stableId: "p:Base", name: "Base" },
        { stableId: "p:Leaf", name: "Leaf" },
        { stableId: "p:Twig", name: "Twig" },
      ]);
    });

    it("rejects an update that closes a cycle", () => {
      if (!base.ok) return;
      const updated = updateDeclarationCatalog(base.value, [
        { name: "Base", extends: ["Leaf"], members: [] },
      ]);
      expect(updated.ok).to.equal(false);
      if (updated.ok) return;
      expect(updated.error.map((d) => d.message)).to.deep.equal([
        "Cyclic heritage: Base -> Leaf -> Base",
      ]);
    });
  });
});

import { suite, test } from "node:test";
import { strictEqual, throws } from "node:assert/strict";
import { z } from "zod";
import { DuplicateOperationError, ReservedOperationError } from "./errors.ts";
import { OperationRegistry } from "./operation-registry.ts";
import { value } from "./parameter-types.ts";

class Shape {
  public area(): number {
    return 0;
  }
}

class Square extends Shape {
  public constructor(public readonly side: number) {
    super();
  }

  public override area(): number {
    return this.side * this.side;
  }
}

const int = value("int", z.number().int());

await suite(import.meta.filename, async () => {
  await test("static operations", async () => {
    const registry = new OperationRegistry()
      .registerStatic("Calculator", "Add", [int, int], (a: number, b: number) => a + b)
      .registerStatic("Geometry", "Add", [int], (a: number) => a);
    strictEqual(registry.findStatic("Calculator", "Add")?.invoke(undefined, [2, 3]), 5);
    strictEqual(registry.findStatic("Geometry", "Add")?.invoke(undefined, [2]), 2);
    strictEqual(registry.findStatic("Calculator", "Subtract"), undefined);
    strictEqual(registry.findStatic("Nowhere", "Add"), undefined);
  });

  await test("instance operations", async () => {
    const registry = new OperationRegistry().registerInstance(
      Shape,
      "Area",
      [],
      (shape: Shape) => shape.area(),
    );
    const square = new Square(3);
    const match = registry.findInstance(square, "Area");
    strictEqual(match?.typeName, "Shape");
    strictEqual(match?.prototype, Shape.prototype);
    strictEqual(match?.descriptor.invoke(square, []), 9);
    strictEqual(registry.findInstance(new Square(1), "Perimeter"), undefined);
    strictEqual(registry.findInstance({}, "Area"), undefined);
    strictEqual(registry.findInstance(7, "Area"), undefined);
  });

  await test("the closest declaration wins", async () => {
    const registry = new OperationRegistry()
      .registerInstance(Shape, "Describe", [], () => "shape")
      .registerInstance(Square, "Describe", [], () => "square");
    strictEqual(
      registry.findInstance(new Square(1), "Describe")?.descriptor.invoke(new Square(1), []),
      "square",
    );
    strictEqual(
      registry.findInstance(new Shape(), "Describe")?.descriptor.invoke(new Shape(), []),
      "shape",
    );
  });

  await test("duplicates", async () => {
    const registry = new OperationRegistry()
      .registerStatic("Calculator", "Add", [], () => 0)
      .registerInstance(Shape, "Area", [], () => 0);
    throws(() => registry.registerStatic("Calculator", "Add", [], () => 1), {
      name: "DuplicateOperationError",
      message: "Operation 'Add' is already registered on 'Calculator'",
    });
    throws(
      () => registry.registerInstance(Shape, "Area", [], () => 1),
      DuplicateOperationError,
    );
  });

  await test("the dispose identifier is reserved", async () => {
    throws(
      () => new OperationRegistry().registerInstance(Shape, "__Dispose", [], () => undefined),
      ReservedOperationError,
    );
  });
});

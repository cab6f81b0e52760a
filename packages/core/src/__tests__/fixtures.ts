import {
  DocSet,
  TYPE_TAG,
  UnhashableError,
  createTypeRegistry,
  identityHash,
  isPlainMapping,
  type ComplexSerializable,
  type TypeDescriptor,
  type UnknownMapping,
} from "../index";

export class Widget implements ComplexSerializable {
  readonly [TYPE_TAG] = "Widget";

  constructor(readonly n: number) {}
}

export class Pair implements ComplexSerializable {
  readonly [TYPE_TAG] = "Pair";

  constructor(
    readonly left: Widget,
    readonly right: Widget
  ) {}
}

export class Sketch implements ComplexSerializable {
  readonly [TYPE_TAG] = "Sketch";

  constructor(readonly label: string) {}
}

export const widgetDescriptor: TypeDescriptor<Widget> = {
  encode: (value) => ({ n: value.n }),
  decode: (fields) => {
    if (typeof fields.n !== "number") {
      throw new Error("n must be a number");
    }
    return new Widget(fields.n);
  },
  hash: (value) => identityHash(value.n),
};

export const pairDescriptor: TypeDescriptor<Pair> = {
  encode: (value) => ({ left: value.left, right: value.right }),
  decode: (fields) => {
    const { left, right } = fields;
    if (!(left instanceof Widget) || !(right instanceof Widget)) {
      throw new Error("Pair expects widgets");
    }
    return new Pair(left, right);
  },
};

export const sketchDescriptor: TypeDescriptor<Sketch> = {
  encode: (value) => ({ label: value.label }),
  decode: (fields) => new Sketch(String(fields.label)),
  hash: () => {
    throw new UnhashableError("sketch");
  },
};

export const createWidgetRegistry = () =>
  createTypeRegistry([
    { tag: "Widget", descriptor: widgetDescriptor },
    { tag: "Pair", descriptor: pairDescriptor },
    { tag: "Sketch", descriptor: sketchDescriptor },
  ]);

export const asMapping = (value: unknown): UnknownMapping => {
  if (!isPlainMapping(value)) {
    throw new Error("expected a mapping");
  }
  return value;
};

export const asDocSet = (value: unknown): DocSet<unknown> => {
  if (!(value instanceof DocSet)) {
    throw new Error("expected a set");
  }
  return value;
};

import { toArray } from "./enumerate";
import { Bracket, makeInterval } from "./interval";
import { parseInterval } from "./parser";
import { countToString, size } from "./size";

const exact = (value: number) => ({ type: "exact", value });

test("stepped intervals", () => {
  expect(size(parseInterval("[1, 10)//2"))).toEqual(exact(5));
  expect(size(parseInterval("[1, 10]//2"))).toEqual(exact(5));
  expect(size(parseInterval("(1, 10)//2"))).toEqual(exact(4));
  expect(size(parseInterval("[-2,-2]//1.0"))).toEqual(exact(1));
  expect(size(parseInterval("[1,2]//0.5"))).toEqual(exact(3));
  expect(size(parseInterval("[-2,-1]//0.75"))).toEqual(exact(2));
});

test("the sign of the step does not change the size", () => {
  expect(size(parseInterval("[1,2]//-0.5"))).toEqual(exact(3));
  expect(size(parseInterval("(1, 10)//-2"))).toEqual(exact(4));
  expect(size(parseInterval("[-1, 3)//-0.5"))).toEqual(exact(8));
});

test("empty intervals", () => {
  expect(size(parseInterval("(1, 1)//1"))).toEqual(exact(0));
  expect(size(parseInterval("[1, 1)//1"))).toEqual(exact(0));
  expect(size(parseInterval("(1, 2)//5"))).toEqual(exact(0));
  expect(size(parseInterval("[1, :neg_infinity]//1"))).toEqual(exact(0));
  expect(size(parseInterval("[:infinity, :infinity]//1"))).toEqual(exact(0));
});

test("unbounded", () => {
  expect(size(parseInterval("[1, 10]"))).toEqual({
    type: "unbounded",
    reason: "continuous",
  });
  expect(size(parseInterval("[1, :infinity)//1"))).toEqual({
    type: "unbounded",
    reason: "infiniteBound",
  });
  expect(size(parseInterval("(:neg_infinity, 5]//-1"))).toEqual({
    type: "unbounded",
    reason: "infiniteBound",
  });
  expect(countToString(size(parseInterval("[1, 10]")))).toEqual("infinity");
  expect(countToString(size(parseInterval("[1, 10)//2")))).toEqual("5");
});

test("size is stable across calls", () => {
  const i = parseInterval("(0, 7]//1.5");
  expect(size(i)).toEqual(size(i));
  expect(i.size()).toEqual(exact(4));
});

test("size agrees with enumeration", () => {
  const brackets: Bracket[] = ["inclusive", "exclusive"];
  const steps = [1, 2, 3, -2, 0.5, -0.75, 4.5];
  const bounds = [
    [1, 10],
    [0, 9],
    [-3, 3],
    [2, 2],
    [-2, -1],
  ];
  for (const left of brackets) {
    for (const right of brackets) {
      for (const step of steps) {
        for (const [min, max] of bounds) {
          const i = makeInterval(left, right, min, max, step);
          expect([i.toString(), size(i)]).toEqual([
            i.toString(),
            exact(toArray(i).length),
          ]);
        }
      }
    }
  }
});

test("size agrees with enumeration for steps with no exact binary form", () => {
  const texts = [
    "[0, 1)//0.1",
    "[0, 0.7]//0.1",
    "[0, 3)//0.3",
    "(0, 1]//0.1",
    "[0, 1]//-0.1",
    "(-1, 1)//-0.3",
    "[0.1, 0.9]//0.2",
    "[-2.2, 5.5)//0.7",
  ];
  for (const text of texts) {
    const i = parseInterval(text);
    expect([text, size(i)]).toEqual([text, exact(toArray(i).length)]);
  }
});

import { showInContext } from "./util";

test("showInContext", () => {
  expect(
    showInContext(["[1, 10)//x"], { index: 9, outerIndex: 0, length: 1 })
  ).toEqual(["[1, 10)//x", "         ^"].join("\n"));

  expect(
    showInContext(["[1,\n2]"], { index: 0, outerIndex: 0, length: 1 })
  ).toEqual(["[1, 2]", "^"].join("\n"));
});

test("showInContext with interpolations", () => {
  const strs = ["[", ", ", "]"];
  expect(showInContext(strs, { index: 0, outerIndex: 2, length: 0 })).toEqual(
    ["[${...}, ${...}]", "         ^^^^^^"].join("\n")
  );
  expect(showInContext(strs, { index: 0, outerIndex: 2, length: 1 })).toEqual(
    ["[${...}, ${...}]", "               ^"].join("\n")
  );
});

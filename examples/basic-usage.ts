import {
  evaluate,
  parseExpression,
  render,
  roll,
  seededRandom,
} from "../src/index";

function oneCallExample() {
  const outcome = roll("2d20 kh1 + 5");
  console.log(`Attack with advantage: ${outcome.text}\n`);
}

function seededExample() {
  const first = roll("4d6 dl1", { seed: "example" });
  const second = roll("4d6 dl1", { seed: "example" });
  console.log(`Seeded:  ${first.text}`);
  console.log(`Again:   ${second.text}\n`);
}

function reuseExample() {
  // one parsed tree, rolled several times
  const expression = parseExpression("3d6 + 2");
  const random = seededRandom("reuse");
  for (let i = 0; i < 3; i++) {
    console.log(render(evaluate(expression, random)));
  }
}

oneCallExample();
seededExample();
reuseExample();

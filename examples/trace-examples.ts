import { roll, RollError } from "../src/index";

const notations = [
  "6 4d6 dl1",
  "2 2d20 kh1 + 8",
  "d20 + 7, 2d6 + 4",
  "2 3 d4",
  "4dF + 1",
];

for (const notation of notations) {
  console.log(roll(notation).text);
  console.log();
}

for (const notation of ["3 d 6", "3d6 kh4", "(2 d6) + 1", "10 / (1d1 - 1)"]) {
  try {
    roll(notation);
  } catch (error) {
    if (!(error instanceof RollError)) throw error;
    console.log(`${notation}: ${error.name}: ${error.message}`);
  }
}

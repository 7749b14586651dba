import { createJsonReader } from "../src/index";

const json = `{
"data": {
  "users": [
    {"name": "Dana", "id": 1},
    {"name": "Eli", "id": 2},
    {"name": "Fern", "id": 3}
  ],
  "colors": ["teal", "amber", "plum"]
}
}`;

const reader = createJsonReader();

// objects and arrays end with the bracket they open
console.log("Element paths:");
for (const path of [...(reader.getPathsFromBuffer(json) ?? [])].sort()) console.log(`\t${path}`);

const users: { name: string; id: number }[] = [];
const colors: string[] = [];
const arrayNames: string[] = [];
const user = { name: "", id: 0 };

reader.onPair("name", (name) => {
  user.name = name ?? "";
});
reader.onPair("id", (id) => {
  user.id = Number(id);
});
reader.onArrayItem("users", () => {
  users.push({ ...user });
});
reader.onArrayItem("{data{colors[", (color) => {
  if (color !== null) colors.push(color);
});
reader.onArrayBegin(null, () => {
  arrayNames.push(reader.getCurrentElementName());
});

if (!reader.readBuffer(json)) {
  console.error(reader.errorDescription);
  process.exitCode = 1;
} else {
  console.log("Users:");
  for (const { name, id } of users) console.log(`\tname: ${name}\t - id: ${id}`);
  console.log("Colors:");
  for (const color of colors) console.log(`\t${color}`);
  console.log("Arrays:");
  for (const name of arrayNames) console.log(`\t${name}`);
}

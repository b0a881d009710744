import { Binary, Email, Integer, Json, PK, Text } from "../column.js";
import { defineModel } from "../model.js";

export const Book = defineModel("Book", {
  columns: { name: Text, year: Integer },
});

export const CustomKey = defineModel("CustomKey", {
  columns: { key: PK, label: Text, data: Binary },
});

export const Fields = defineModel("Fields", {
  columns: { email: Email, json: Json },
});

import { Integer, Text } from "../../../litorm/column.js";
import { defineModel } from "../../../litorm/model.js";

export const Note = defineModel("Note", {
  columns: { title: Text, stars: Integer },
});

export const models = [Note];

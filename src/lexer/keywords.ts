export type Vocabulary = ReadonlyMap<string, string>;

export const PRINT_TARGET = "print";

export const KEYWORDS: Vocabulary = new Map([
  ["አሳይ", PRINT_TARGET],
  ["ከሆነ", "if"],
  ["ያለበለዚያ", "else"],
  ["ያለበለዚያ_ከሆነ", "elif"],
  ["ለ", "for"],
  ["በ", "in"],
  ["ክልል", "range"],
  ["እስከሆነ", "while"],
  ["ሥራ", "def"],
  ["መመለስ", "return"],
  ["እውነት", "True"],
  ["ሐሰት", "False"],
  ["እና", "and"],
  ["ወይም", "or"],
  ["አይደለም", "not"],
  ["እኩል", "=="],
  ["እኩል_አይደለም", "!="],
  ["ትልቅ", ">"],
  ["ትንሽ", "<"],
  ["ትልቅ_ወይም_እኩል", ">="],
  ["ትንሽ_ወይም_እኩል", "<="],
]);

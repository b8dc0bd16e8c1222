// Item numbers and result names are free text; NUL cannot appear in either.
export const toPairKey = (itemNumber: string, resultName: string): string =>
  `${itemNumber}\u0000${resultName}`;

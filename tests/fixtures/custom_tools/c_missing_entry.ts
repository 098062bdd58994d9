export const description = "no entry point here";

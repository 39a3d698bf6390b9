// pdf-parse's package entry runs a debug self-test when it is not loaded via
// require() from another CommonJS module, so the library module is imported
// directly. It shares the typings of the package entry.
declare module "pdf-parse/lib/pdf-parse.js" {
  import pdfParse from "pdf-parse";
  export default pdfParse;
}

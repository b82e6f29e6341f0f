// svgdom ships no type declarations and has no @types package.
declare module "svgdom" {
  export function createSVGWindow(): Window;
  export function createSVGDocument(): Document;
  export function createHTMLWindow(): Window;
}

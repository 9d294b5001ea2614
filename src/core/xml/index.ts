export {
  parseFragment,
  childElements,
  firstChildElement,
  descendantElements,
  getAttribute,
  textContent,
  type DocElement,
  type DocNode,
  type DocText,
} from "./fragment.js";

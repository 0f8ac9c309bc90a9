export { describeView, type View, type ViewContext } from "./View";

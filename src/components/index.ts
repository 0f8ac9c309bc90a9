export { CounterView } from "./CounterView";
export { WelcomeView } from "./WelcomeView";

export { Header } from './Header';
export { StatusBar } from './StatusBar';

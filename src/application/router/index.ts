export { Router, createRouter, stripPrefix } from './Router';

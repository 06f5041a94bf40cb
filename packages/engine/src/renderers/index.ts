export { Canvas2DRenderer, type Canvas2DRendererConfig } from "./Canvas2DRenderer";

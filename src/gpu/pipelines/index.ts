export { TrianglePipeline } from './TrianglePipeline';
export { GuiPipeline } from './GuiPipeline';

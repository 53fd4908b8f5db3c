export { GuiContext, GuiFrame } from './GuiContext';
export { Ui } from './Ui';
export { DemoPanels } from './DemoPanels';
export { FontAtlas, FONT_TEXTURE_ID, getDefaultFont } from './font';
export { FrameInput, InputState, containsPoint } from './input';
export { tessellate } from './tessellate';
export { toPixelScissor } from './clip';
export type {
    GuiDrawCall,
    GuiFrameOutput,
    GuiInputEvent,
    GuiLayer,
    GuiShape,
    GuiTexturesDelta,
    GuiTextureUpload,
    Rgba,
    ScreenDescriptor,
} from './types';

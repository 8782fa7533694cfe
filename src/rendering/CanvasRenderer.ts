import type { DrawCommand, PolygonCommand, PolylineCommand, Renderer } from '../core/types.js';
import { Vector2 } from '../physics/Vector2.js';

// Canvas 2D renderer. Works in CSS pixels; the backing store follows the
// device pixel ratio.
export class CanvasRenderer implements Renderer {
  private canvas: HTMLCanvasElement;
  private context: CanvasRenderingContext2D;
  private pixelRatio: number;

  constructor(canvas: HTMLCanvasElement) {
    this.canvas = canvas;
    const ctx = canvas.getContext('2d');
    if (!ctx) {
      throw new Error('Could not get 2D rendering context');
    }
    this.context = ctx;
    this.pixelRatio = window.devicePixelRatio || 1;
    this.setupCanvas();
  }

  /**
   * Initialize canvas with proper sizing and pixel ratio
   */
  private setupCanvas(): void {
    const rect = this.canvas.getBoundingClientRect();
    this.pixelRatio = window.devicePixelRatio || 1;

    // Unlaid-out canvases report 0x0; keep their attribute size then
    const cssWidth = rect.width || this.canvas.width;
    const cssHeight = rect.height || this.canvas.height;

    const w = Math.max(1, Math.floor(cssWidth * this.pixelRatio));
    const h = Math.max(1, Math.floor(cssHeight * this.pixelRatio));
    if (this.canvas.width !== w) this.canvas.width = w;
    if (this.canvas.height !== h) this.canvas.height = h;

    // Reset then scale to avoid compounding on repeated setup
    this.context.setTransform(1, 0, 0, 1, 0, 0);
    this.context.scale(this.pixelRatio, this.pixelRatio);

    this.canvas.style.width = `${cssWidth}px`;
    this.canvas.style.height = `${cssHeight}px`;
  }

  /**
   * Fill the whole canvas
   * @param color Background color
   */
  clear(color = '#000000'): void {
    const size = this.getSize();
    this.context.fillStyle = color;
    this.context.fillRect(0, 0, size.x, size.y);
  }

  draw(command: DrawCommand): void {
    switch (command.kind) {
      case 'polygon':
        this.drawPolygon(command);
        break;
      case 'polyline':
        this.drawPolyline(command);
        break;
    }
  }

  private drawPolygon(command: PolygonCommand): void {
    this.context.save();
    this.context.translate(command.dest.x, command.dest.y);
    this.context.rotate(command.rotation);
    this.tracePath(command.points);
    this.context.closePath();
    this.stroke(command.color);
    this.context.restore();
  }

  private drawPolyline(command: PolylineCommand): void {
    this.context.save();
    this.context.translate(command.offset.x, command.offset.y);
    this.tracePath(command.points);
    this.stroke(command.color);
    this.context.restore();
  }

  private tracePath(points: readonly Vector2[]): void {
    this.context.beginPath();
    points.forEach((p, i) => {
      if (i === 0) this.context.moveTo(p.x, p.y);
      else this.context.lineTo(p.x, p.y);
    });
  }

  private stroke(color: string, lineWidth = 1): void {
    this.context.strokeStyle = color;
    this.context.lineWidth = lineWidth;
    this.context.stroke();
  }

  /**
   * Handle canvas resize
   */
  handleResize(): void {
    this.setupCanvas();
  }

  /**
   * Get canvas dimensions
   * @returns Canvas size in CSS pixels
   */
  getSize(): Vector2 {
    return new Vector2(this.canvas.width / this.pixelRatio, this.canvas.height / this.pixelRatio);
  }

  // One-line renderer info for the startup log
  describe(): string {
    const size = this.getSize();
    return `Canvas 2D ${size.x}x${size.y} @${this.pixelRatio}x`;
  }
}

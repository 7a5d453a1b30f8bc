// JSDOM does not always expose PointerEvent. The DOM host listens for pointer events;
// provide a minimal shim backed by MouseEvent so `new PointerEvent(...)` works in tests.
if (typeof globalThis.PointerEvent === "undefined" && typeof globalThis.MouseEvent === "function") {
  class PointerEventShim extends globalThis.MouseEvent {
    readonly pointerId: number;
    readonly pointerType: string;

    constructor(type: string, init: PointerEventInit = {}) {
      // Pointer events from real input bubble; `MouseEvent` defaults `bubbles` to false.
      super(type, { bubbles: true, cancelable: true, ...init });
      this.pointerId = typeof init.pointerId === "number" ? init.pointerId : 1;
      this.pointerType = typeof init.pointerType === "string" ? init.pointerType : "mouse";
    }
  }

  Object.defineProperty(globalThis, "PointerEvent", {
    value: PointerEventShim,
    configurable: true,
    writable: true,
  });
}

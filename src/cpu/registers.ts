/**
 * Register File
 *
 * Holds the primary and shadow 8-bit sets, the index registers and
 * SP/PC. Pairs are views over two 8-bit cells (high:low); nothing is
 * stored twice. Every setter masks to the register width, and F is
 * additionally masked to the architecture's flag layout.
 */

import type { FlagLayout, Reg8, Reg16, RegisterState } from './types';

export class RegisterFile {
  // Main registers
  private _a = 0;
  private _f = 0;
  private _b = 0;
  private _c = 0;
  private _d = 0;
  private _e = 0;
  private _h = 0;
  private _l = 0;

  // Shadow registers
  private a_ = 0;
  private f_ = 0;
  private b_ = 0;
  private c_ = 0;
  private d_ = 0;
  private e_ = 0;
  private h_ = 0;
  private l_ = 0;

  // Index registers
  private _ix = 0;
  private _iy = 0;

  // Special registers
  private _sp = 0;
  private _pc = 0;

  private readonly layout: FlagLayout;

  constructor(layout: FlagLayout) {
    this.layout = layout;
    this._f = layout.alwaysOne;
    this.f_ = layout.alwaysOne;
  }

  // --- 8-bit register accessors ---
  get a(): number { return this._a; }
  set a(v: number) { this._a = v & 0xff; }

  get f(): number { return this._f; }
  set f(v: number) { this._f = this.maskFlags(v); }

  get b(): number { return this._b; }
  set b(v: number) { this._b = v & 0xff; }

  get c(): number { return this._c; }
  set c(v: number) { this._c = v & 0xff; }

  get d(): number { return this._d; }
  set d(v: number) { this._d = v & 0xff; }

  get e(): number { return this._e; }
  set e(v: number) { this._e = v & 0xff; }

  get h(): number { return this._h; }
  set h(v: number) { this._h = v & 0xff; }

  get l(): number { return this._l; }
  set l(v: number) { this._l = v & 0xff; }

  // --- 16-bit register pair accessors ---
  get af(): number { return (this._a << 8) | this._f; }
  set af(v: number) { this._a = (v >> 8) & 0xff; this._f = this.maskFlags(v); }

  get bc(): number { return (this._b << 8) | this._c; }
  set bc(v: number) { this._b = (v >> 8) & 0xff; this._c = v & 0xff; }

  get de(): number { return (this._d << 8) | this._e; }
  set de(v: number) { this._d = (v >> 8) & 0xff; this._e = v & 0xff; }

  get hl(): number { return (this._h << 8) | this._l; }
  set hl(v: number) { this._h = (v >> 8) & 0xff; this._l = v & 0xff; }

  get ix(): number { return this._ix; }
  set ix(v: number) { this._ix = v & 0xffff; }

  get iy(): number { return this._iy; }
  set iy(v: number) { this._iy = v & 0xffff; }

  get sp(): number { return this._sp; }
  set sp(v: number) { this._sp = v & 0xffff; }

  get pc(): number { return this._pc; }
  set pc(v: number) { this._pc = v & 0xffff; }

  // --- Access by name (used by the addressing resolver) ---
  get8(name: Reg8): number {
    switch (name) {
      case 'a': return this._a;
      case 'f': return this._f;
      case 'b': return this._b;
      case 'c': return this._c;
      case 'd': return this._d;
      case 'e': return this._e;
      case 'h': return this._h;
      case 'l': return this._l;
    }
  }

  set8(name: Reg8, value: number): void {
    switch (name) {
      case 'a': this.a = value; break;
      case 'f': this.f = value; break;
      case 'b': this.b = value; break;
      case 'c': this.c = value; break;
      case 'd': this.d = value; break;
      case 'e': this.e = value; break;
      case 'h': this.h = value; break;
      case 'l': this.l = value; break;
    }
  }

  getPair(name: Reg16): number {
    switch (name) {
      case 'af': return this.af;
      case 'bc': return this.bc;
      case 'de': return this.de;
      case 'hl': return this.hl;
      case 'sp': return this._sp;
      case 'ix': return this._ix;
      case 'iy': return this._iy;
    }
  }

  setPair(name: Reg16, value: number): void {
    switch (name) {
      case 'af': this.af = value; break;
      case 'bc': this.bc = value; break;
      case 'de': this.de = value; break;
      case 'hl': this.hl = value; break;
      case 'sp': this.sp = value; break;
      case 'ix': this.ix = value; break;
      case 'iy': this.iy = value; break;
    }
  }

  /** Wraps at $FFFF. Flags are never touched. */
  incrementPair(name: Reg16): void {
    this.setPair(name, this.getPair(name) + 1);
  }

  /** Wraps at $0000. Flags are never touched. */
  decrementPair(name: Reg16): void {
    this.setPair(name, this.getPair(name) - 1);
  }

  // --- Shadow bank ---

  /** Swap A, F, B, C, D, E, H, L with the shadow set in one step. */
  exchangeShadow(): void {
    this.exchangeAccumulator();
    this.exchangeMain();
  }

  /** EX AF,AF' */
  exchangeAccumulator(): void {
    let t = this._a; this._a = this.a_; this.a_ = t;
    t = this._f; this._f = this.f_; this.f_ = t;
  }

  /** EXX: BC, DE, HL only. */
  exchangeMain(): void {
    let t: number;
    t = this._b; this._b = this.b_; this.b_ = t;
    t = this._c; this._c = this.c_; this.c_ = t;
    t = this._d; this._d = this.d_; this.d_ = t;
    t = this._e; this._e = this.e_; this.e_ = t;
    t = this._h; this._h = this.h_; this.h_ = t;
    t = this._l; this._l = this.l_; this.l_ = t;
  }

  reset(stackPointer: number): void {
    this._a = this._b = this._c = this._d = this._e = this._h = this._l = 0;
    this.a_ = this.b_ = this.c_ = this.d_ = this.e_ = this.h_ = this.l_ = 0;
    this._f = this.f_ = this.layout.alwaysOne;
    this._ix = this._iy = 0;
    this._sp = stackPointer & 0xffff;
    this._pc = 0;
  }

  snapshot(): RegisterState {
    return {
      a: this._a, f: this._f,
      b: this._b, c: this._c, d: this._d, e: this._e, h: this._h, l: this._l,
      a_: this.a_, f_: this.f_,
      b_: this.b_, c_: this.c_, d_: this.d_, e_: this.e_, h_: this.h_, l_: this.l_,
      ix: this._ix, iy: this._iy,
      sp: this._sp, pc: this._pc,
    };
  }

  private maskFlags(v: number): number {
    return (v & this.layout.mask) | this.layout.alwaysOne;
  }
}

// Environment module for `opdispatch examples/simpleVm.dtab --env <this file>`
import { Register } from "./simpleVm";

export const enums = { Register };

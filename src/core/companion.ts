/** Marks a value object that shares its name with a type, e.g. ScalerError (the interface)
 *  and ScalerError (the static helpers).
 *
 *  Identity at runtime; it only exists so companions are easy to find.
 * */
export function StaticTypeCompanion<const Companion>(t: Companion): Companion {
  return t
}

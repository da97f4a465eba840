import type { Cuisine } from "../../common/common-enum";
import type { MacroTargets } from "./nutritionTarget";
import type { UserProfile } from "./userProfile.model";

export interface SessionState {
  profile: UserProfile | null;
  macros: MacroTargets | null;
  cuisine: Cuisine | null;
}

/**
 * Assignment Intent Validator
 * Decides whether an intent may be assigned for an app type and target
 */

import {
  ASSIGNMENT_INTENTS,
  AppType,
  AssignmentIntent,
  AssignmentTargetType,
} from '../types';
import { APP_TYPE_LABELS, TARGET_LABELS } from '../utils/constants';

export type IntentValidation = { valid: true } | { valid: false; reason: string };

type AppFamily = 'vpp' | 'managedStore' | 'lob' | 'web' | 'publicStore' | 'other';

interface AppTypeCapabilities {
  family: AppFamily;
  uninstall: boolean;
  withoutEnrollment: boolean;
  availableForAllDevices: boolean;
}

function capabilitiesOf(appType: AppType): AppTypeCapabilities {
  switch (appType) {
    case 'iosVppApp':
    case 'macOSVppApp':
      return { family: 'vpp', uninstall: true, withoutEnrollment: false, availableForAllDevices: true };

    case 'managedIOSStoreApp':
    case 'managedMacOSStoreApp':
      return { family: 'managedStore', uninstall: true, withoutEnrollment: false, availableForAllDevices: false };

    case 'iosLobApp':
    case 'macOSLobApp':
    case 'macOSDmgApp':
    case 'macOSPkgApp':
      return { family: 'lob', uninstall: true, withoutEnrollment: false, availableForAllDevices: false };

    case 'webApp':
    case 'windowsWebApp':
      return { family: 'web', uninstall: false, withoutEnrollment: true, availableForAllDevices: false };

    case 'iosStoreApp':
    case 'androidStoreApp':
      return { family: 'publicStore', uninstall: false, withoutEnrollment: true, availableForAllDevices: false };

    case 'macOSApp':
    case 'macOSOfficeSuiteApp':
    case 'win32LobApp':
    case 'winGetApp':
    case 'androidManagedStoreApp':
      return { family: 'other', uninstall: true, withoutEnrollment: false, availableForAllDevices: false };

    // Unrecognised types get only the intents every app type supports
    case 'unknown':
      return { family: 'other', uninstall: false, withoutEnrollment: false, availableForAllDevices: false };

    default: {
      const unhandled: never = appType;
      throw new Error(`Unhandled app type: ${String(unhandled)}`);
    }
  }
}

function appTypeRestriction(intent: AssignmentIntent, appType: AppType): string | null {
  const caps = capabilitiesOf(appType);
  const label = APP_TYPE_LABELS[appType];

  switch (intent) {
    case 'available':
    case 'required':
      return null;

    case 'availableWithoutEnrollment':
      if (caps.withoutEnrollment) {
        return null;
      }
      switch (caps.family) {
        case 'vpp':
          return "VPP apps require device enrollment for licensing and cannot be assigned as 'Available without enrollment'";
        case 'managedStore':
          return "Managed store apps require device enrollment and cannot be assigned as 'Available without enrollment'";
        case 'lob':
          return 'Line-of-business apps require device enrollment for installation';
        default:
          return `${label} apps do not support 'Available without enrollment'`;
      }

    case 'uninstall':
      if (caps.uninstall) {
        return null;
      }
      switch (caps.family) {
        case 'web':
          return 'Web apps cannot be uninstalled as they are just web links';
        case 'publicStore':
          return `${label} apps cannot be uninstalled via Intune`;
        default:
          return `${label} apps do not support uninstall assignments`;
      }

    default: {
      const unhandled: never = intent;
      throw new Error(`Unhandled intent: ${String(unhandled)}`);
    }
  }
}

function targetRestriction(
  intent: AssignmentIntent,
  appType: AppType,
  targetType: AssignmentTargetType
): string | null {
  switch (intent) {
    case 'available':
      if (targetType === 'allDevices' && !capabilitiesOf(appType).availableForAllDevices) {
        return "'Available' intent is not supported for 'All Devices' target with non-VPP apps. Use 'Required' instead for device-wide deployments";
      }
      return null;

    case 'availableWithoutEnrollment':
      if (targetType === 'allUsers' || targetType === 'allLicensedUsers') {
        return null;
      }
      return `'Available without enrollment' cannot be used with ${TARGET_LABELS[targetType]} targets as devices must be enrolled to receive assignments`;

    case 'required':
    case 'uninstall':
      return null;

    default: {
      const unhandled: never = intent;
      throw new Error(`Unhandled intent: ${String(unhandled)}`);
    }
  }
}

export function validateIntent(
  intent: AssignmentIntent,
  appType: AppType,
  targetType: AssignmentTargetType
): IntentValidation {
  const reason = appTypeRestriction(intent, appType) ?? targetRestriction(intent, appType, targetType);
  return reason === null ? { valid: true } : { valid: false, reason };
}

export function isIntentValid(
  intent: AssignmentIntent,
  appType: AppType,
  targetType: AssignmentTargetType
): boolean {
  return validateIntent(intent, appType, targetType).valid;
}

export function validIntents(appType: AppType, targetType: AssignmentTargetType): AssignmentIntent[] {
  return ASSIGNMENT_INTENTS.filter((intent) => isIntentValid(intent, appType, targetType));
}

/**
 * Valid intents ordered for a picker: the preferred intent first when it is
 * valid, otherwise its closest legal alternative
 */
export function suggestedIntents(
  appType: AppType,
  targetType: AssignmentTargetType,
  preferred?: AssignmentIntent
): AssignmentIntent[] {
  const valid = validIntents(appType, targetType);
  if (!preferred) {
    return valid;
  }

  const promote = (intent: AssignmentIntent) => [intent, ...valid.filter((i) => i !== intent)];

  if (valid.includes(preferred)) {
    return promote(preferred);
  }
  if (preferred === 'availableWithoutEnrollment' && valid.includes('available')) {
    return promote('available');
  }
  if (preferred === 'available' && targetType === 'allDevices' && valid.includes('required')) {
    return promote('required');
  }
  return valid;
}

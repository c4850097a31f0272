import { NextResponse } from 'next/server';
import { getConfiguredAssistants, validateEnvForAPI } from '@/lib/config/env-validation';
import { DESTINATION_NAMES, DESTINATION_ROUTES } from '@/lib/config/destinations';

export async function GET() {
  const validation = validateEnvForAPI();
  const assistants = getConfiguredAssistants();

  const destinations = DESTINATION_NAMES.map(name => {
    const route = DESTINATION_ROUTES[name];
    const configured = assistants[route.assistantKey];
    return {
      name,
      sheet: route.sheetName,
      preset: route.preset,
      configured,
      requiredVars: [route.assistantKey],
      status: validation.success && configured ? 'ready' : 'missing_credentials',
    };
  });

  const ready = destinations.filter(d => d.status === 'ready');

  return NextResponse.json({
    success: validation.success && ready.length === destinations.length,
    message: validation.success
      ? `${ready.length} of ${destinations.length} destination(s) ready`
      : validation.error,
    destinations,
    missingVars: validation.success ? [] : validation.variables,
    summary: {
      totalDestinations: destinations.length,
      readyDestinations: ready.length,
      readyToRun: validation.success && ready.length > 0,
    },
  });
}
